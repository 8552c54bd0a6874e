import config from '../config/index.js';
import logger from '../config/logger.js';
import { createError } from '../middleware/errorHandler.js';
import { DuplicateKeyError } from '../repositories/errors.js';
import { DataStore } from '../repositories/types.js';
import { IUser } from '../types/index.js';
import { SignupInput } from '../utils/validators.js';
import { hashPassword, verifyPassword } from './credentialService.js';

// Maps a unique-index violation on users to the user-facing duplicate error
export const toDuplicateUserError = (error: DuplicateKeyError) =>
    error.field === 'email' ? createError.duplicateEmail() : createError.duplicateUsername();

export class AuthService {
    constructor(private readonly store: DataStore) {}

    /**
     * Creates the user with a hashed credential. Uniqueness is left to the
     * store's constraint at commit time; two concurrent signups for the same
     * name race there and exactly one wins.
     */
    async signup(input: SignupInput): Promise<IUser> {
        const passwordHash = await hashPassword(input.password);

        try {
            const user = await this.store.transaction((tx) =>
                tx.users.create({
                    username: input.username,
                    email: input.email,
                    passwordHash,
                    imageUrl: input.imageUrl || config.defaults.imageUrl,
                })
            );
            logger.info('User signed up', { userId: user.id, username: user.username });
            return user;
        } catch (error) {
            if (error instanceof DuplicateKeyError) {
                throw toDuplicateUserError(error);
            }
            throw error;
        }
    }

    /**
     * Returns the user when the password verifies, otherwise null. An unknown
     * username and a wrong password are indistinguishable to the caller.
     */
    async authenticate(username: string, password: string): Promise<IUser | null> {
        const user = await this.store.users.findByUsername(username);
        if (!user) {
            return null;
        }

        const isMatch = await verifyPassword(user.passwordHash, password);
        return isMatch ? user : null;
    }
}
