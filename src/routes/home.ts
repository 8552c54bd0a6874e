import { Router } from 'express';
import { createHomeController } from '../controllers/homeController.js';
import { Services } from '../services/index.js';

export const createHomeRouter = (services: Services): Router => {
    const router = Router();
    const homeController = createHomeController(services);

    /**
     * @swagger
     * /:
     *   get:
     *     summary: Home feed (own and followed users' warbles) or landing data
     *     tags: [Home]
     *     security: []
     *     responses:
     *       200:
     *         description: Feed, newest first, at most 100 warbles
     */
    router.get('/', homeController.home);

    return router;
};
