import mongoose from 'mongoose';
import config from './index.js';
import logger from './logger.js';

export const connectDB = async (): Promise<void> => {
    const conn = await mongoose.connect(config.mongodb.uri);
    logger.info(`MongoDB connected: ${conn.connection.host}`);

    // Duplicate detection relies on the unique indexes being in place
    await Promise.all(
        Object.values(mongoose.models).map((model) => model.syncIndexes())
    );
    logger.info('MongoDB indexes synchronised');
};

mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
});

mongoose.connection.on('error', (err: unknown) => {
    logger.error('MongoDB error', { error: err instanceof Error ? err.message : String(err) });
});

export default mongoose;
