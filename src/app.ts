import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import swaggerUi from 'swagger-ui-express';

import config from './config/index.js';
import { correlationIdMiddleware, requestLogger } from './config/logger.js';
import swaggerSpec from './config/swagger.js';
import { resolveViewer } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { DataStore } from './repositories/types.js';
import { createServices } from './services/index.js';

import { createAuthRouter } from './routes/auth.js';
import { createHomeRouter } from './routes/home.js';
import { createMessageRouter } from './routes/message.js';
import { createUserRouter } from './routes/user.js';

export const createApp = (store: DataStore): Application => {
    const app = express();
    const services = createServices(store);

    app.set('trust proxy', 1);

    app.use(correlationIdMiddleware);

    // CORS configuration
    app.use(cors({
        origin: (origin, callback) => {
            const allowedOrigins = config.clientUrl.split(',').map(url => url.trim());
            if (!origin || allowedOrigins.indexOf(origin) !== -1) {
                callback(null, true);
            } else {
                callback(new Error('Not allowed by CORS'));
            }
        },
        credentials: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    }));

    app.use(express.json({ limit: '100kb' }));
    app.use(express.urlencoded({ extended: true }));
    app.use(cookieParser(config.cookie.secret));

    // Every request gets a viewer before any route runs
    app.use(resolveViewer(services.sessions));
    app.use(requestLogger);

    // Swagger documentation
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'Warbler API Docs',
    }));

    // Health check (no rate limiting)
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: 'ok',
                timestamp: new Date().toISOString(),
                version: '1.0.0',
            },
        });
    });

    app.use('/api', apiLimiter);

    // API Routes
    app.use('/api', createHomeRouter(services));
    app.use('/api', createAuthRouter(services));
    app.use('/api/users', createUserRouter(services));
    app.use('/api/messages', createMessageRouter(services));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};

export default createApp;
