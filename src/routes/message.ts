import { Router } from 'express';
import { createMessageController } from '../controllers/messageController.js';
import { requireUser } from '../middleware/auth.js';
import { postMessageLimiter } from '../middleware/rateLimiter.js';
import { validate } from '../middleware/validate.js';
import { Services } from '../services/index.js';
import { newMessageSchema } from '../utils/validators.js';

export const createMessageRouter = (services: Services): Router => {
    const router = Router();
    const messageController = createMessageController(services);

    /**
     * @swagger
     * /messages/new:
     *   post:
     *     summary: Post a warble
     *     tags: [Messages]
     *     requestBody:
     *       required: true
     *       content:
     *         application/json:
     *           schema:
     *             type: object
     *             required: [text]
     *             properties:
     *               text: { type: string, minLength: 1, maxLength: 140 }
     *     responses:
     *       201:
     *         description: Warble created
     *       400:
     *         description: Validation error
     *       401:
     *         description: Access unauthorized
     */
    router.post('/new', requireUser, postMessageLimiter, validate(newMessageSchema), messageController.createMessage);

    router.get('/:id', messageController.getMessage);

    /**
     * @swagger
     * /messages/{id}/delete:
     *   post:
     *     summary: Delete one of your own warbles
     *     tags: [Messages]
     *     parameters:
     *       - in: path
     *         name: id
     *         required: true
     *         schema: { type: integer }
     *     responses:
     *       200:
     *         description: Deleted
     *       401:
     *         description: Access unauthorized
     *       403:
     *         description: Not the owner
     *       404:
     *         description: Warble not found
     */
    router.post('/:id/delete', messageController.deleteMessage);

    return router;
};
