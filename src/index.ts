import { createServer } from 'http';
import mongoose from 'mongoose';

import createApp from './app.js';
import config from './config/index.js';
import { connectDB } from './config/database.js';
import logger from './config/logger.js';
import { createMongoStore } from './repositories/mongoStore.js';

const app = createApp(createMongoStore());
const httpServer = createServer(app);

// Graceful shutdown
const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    // Stop accepting new connections
    httpServer.close(() => {
        logger.info('HTTP server closed');
    });

    try {
        await mongoose.connection.close();
        logger.info('MongoDB connection closed');

        logger.info('Graceful shutdown complete');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown', { error });
        process.exit(1);
    }
};

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled rejection', { reason });
});

const startServer = async (): Promise<void> => {
    try {
        await connectDB();

        httpServer.listen(config.port, () => {
            logger.info(`Server running on port ${config.port} in ${config.env} mode`);
            logger.info(`API Docs: http://localhost:${config.port}/api-docs`);
            logger.info(`Client URL: ${config.clientUrl}`);
        });
    } catch (error) {
        logger.error('Failed to start server', { error });
        process.exit(1);
    }
};

void startServer();

export { app };
