import { Router } from 'express';
import { createAuthController } from '../controllers/authController.js';
import { loginLimiter, signupLimiter } from '../middleware/rateLimiter.js';
import { validate } from '../middleware/validate.js';
import { Services } from '../services/index.js';
import { loginSchema, signupSchema } from '../utils/validators.js';

export const createAuthRouter = (services: Services): Router => {
    const router = Router();
    const authController = createAuthController(services);

    /**
     * @swagger
     * /signup:
     *   post:
     *     summary: Register a new user and start a session
     *     tags: [Auth]
     *     security: []
     *     requestBody:
     *       required: true
     *       content:
     *         application/json:
     *           schema:
     *             type: object
     *             required: [username, email, password]
     *             properties:
     *               username: { type: string }
     *               email: { type: string, format: email }
     *               password: { type: string, minLength: 6 }
     *               imageUrl: { type: string }
     *     responses:
     *       201:
     *         description: User created and logged in
     *       400:
     *         description: Validation error
     *       409:
     *         description: Username or email already taken
     */
    router.post('/signup', signupLimiter, validate(signupSchema), authController.signup);

    /**
     * @swagger
     * /login:
     *   post:
     *     summary: Log in with username and password
     *     tags: [Auth]
     *     security: []
     *     requestBody:
     *       required: true
     *       content:
     *         application/json:
     *           schema:
     *             type: object
     *             required: [username, password]
     *             properties:
     *               username: { type: string }
     *               password: { type: string }
     *     responses:
     *       200:
     *         description: Login successful
     *       401:
     *         description: Invalid credentials
     */
    router.post('/login', loginLimiter, validate(loginSchema), authController.login);

    /**
     * @swagger
     * /logout:
     *   get:
     *     summary: End the current session
     *     tags: [Auth]
     *     security: []
     *     responses:
     *       200:
     *         description: Logged out (also when already anonymous)
     */
    router.get('/logout', authController.logout);

    return router;
};
