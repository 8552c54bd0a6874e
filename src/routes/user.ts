import { Router } from 'express';
import { createUserController } from '../controllers/userController.js';
import { requireUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { Services } from '../services/index.js';
import { updateProfileSchema } from '../utils/validators.js';

export const createUserRouter = (services: Services): Router => {
    const router = Router();
    const userController = createUserController(services);

    /**
     * @swagger
     * /users:
     *   get:
     *     summary: List users, optionally searching usernames
     *     tags: [Users]
     *     security: []
     *     parameters:
     *       - in: query
     *         name: q
     *         schema: { type: string }
     *     responses:
     *       200:
     *         description: Matching users
     */
    router.get('/', userController.listUsers);

    // Account routes (acting user only)
    router.post('/profile', requireUser, validate(updateProfileSchema), userController.updateProfile);
    router.post('/delete', userController.deleteAccount);

    // Follow graph
    router.post('/follow/:id', userController.follow);
    router.post('/stop-following/:id', userController.stopFollowing);

    // Likes
    router.post('/add_like/:id', userController.toggleLike);

    /**
     * @swagger
     * /users/{id}:
     *   get:
     *     summary: Profile with the latest 100 warbles
     *     tags: [Users]
     *     security: []
     *     parameters:
     *       - in: path
     *         name: id
     *         required: true
     *         schema: { type: integer }
     *     responses:
     *       200:
     *         description: Profile
     *       404:
     *         description: User not found
     */
    router.get('/:id', userController.getProfile);
    router.get('/:id/likes', userController.getLikes);
    router.get('/:id/following', userController.getFollowing);
    router.get('/:id/followers', userController.getFollowers);

    return router;
};
