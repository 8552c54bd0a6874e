import bcrypt from 'bcryptjs';
import config from '../config/index.js';
import logger from '../config/logger.js';

// One-way salted hash: hashing the same password twice yields different credentials
export const hashPassword = async (password: string): Promise<string> => {
    const salt = await bcrypt.genSalt(config.security.bcryptRounds);
    return bcrypt.hash(password, salt);
};

// Never throws: a malformed credential is simply not a match
export const verifyPassword = async (credential: string, password: string): Promise<boolean> => {
    try {
        return await bcrypt.compare(password, credential);
    } catch (error) {
        logger.debug('Credential verification failed', {
            error: error instanceof Error ? error.message : String(error),
        });
        return false;
    }
};
