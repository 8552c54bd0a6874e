import jwt from 'jsonwebtoken';
import config from '../config/index.js';
import logger from '../config/logger.js';
import { DataStore } from '../repositories/types.js';
import { IUser, SessionPayload, Viewer } from '../types/index.js';

export const ANONYMOUS: Viewer = { kind: 'anonymous' };

const isSessionPayload = (value: unknown): value is SessionPayload =>
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'number';

/**
 * Two-state session: Anonymous or Authenticated(user). The identity itself
 * lives client-side in a signed token; this service issues tokens on login
 * and turns a presented token back into a Viewer.
 */
export class SessionService {
    constructor(private readonly store: DataStore) {}

    // Anonymous -> Authenticated(user)
    login(user: IUser): string {
        const payload: SessionPayload = { userId: user.id };
        return jwt.sign(payload, config.session.secret, {
            expiresIn: config.session.maxAgeSeconds,
        });
    }

    /**
     * Resolves the acting identity. A missing, forged or expired token, or
     * one naming a user that no longer exists, yields the anonymous viewer.
     */
    async resolve(token: string | undefined): Promise<Viewer> {
        if (!token) {
            return ANONYMOUS;
        }

        let decoded: unknown;
        try {
            decoded = jwt.verify(token, config.session.secret);
        } catch (error) {
            logger.debug('Discarding invalid session token', {
                error: error instanceof Error ? error.message : String(error),
            });
            return ANONYMOUS;
        }

        if (!isSessionPayload(decoded)) {
            return ANONYMOUS;
        }

        const user = await this.store.users.findById(decoded.userId);
        return user ? { kind: 'authenticated', user } : ANONYMOUS;
    }
}
