import config from '../config/index.js';
import logger from '../config/logger.js';
import { createError } from '../middleware/errorHandler.js';
import { DuplicateKeyError } from '../repositories/errors.js';
import { DataStore } from '../repositories/types.js';
import { IMessage, IUser, ProfileStats, Viewer } from '../types/index.js';
import { UpdateProfileInput } from '../utils/validators.js';
import { AuthService, toDuplicateUserError } from './authService.js';

export interface ProfileData {
    user: IUser;
    messages: IMessage[];
    stats: ProfileStats;
    isFollowing: boolean | null;
}

export class UserService {
    constructor(
        private readonly store: DataStore,
        private readonly auth: AuthService
    ) {}

    async getUser(id: number): Promise<IUser> {
        const user = await this.store.users.findById(id);
        if (!user) {
            throw createError.userNotFound();
        }
        return user;
    }

    async listUsers(search?: string): Promise<IUser[]> {
        return this.store.users.search(search || undefined);
    }

    /**
     * Profile page data: the user, their latest messages and counters.
     * `isFollowing` is null for anonymous viewers.
     */
    async getProfile(id: number, viewer: Viewer): Promise<ProfileData> {
        const user = await this.getUser(id);

        const [messages, messageCount, following, followers, likes] = await Promise.all([
            this.store.messages.listByAuthors([user.id], config.pagination.messageLimit),
            this.store.messages.countByAuthor(user.id),
            this.store.follows.countFollowing(user.id),
            this.store.follows.countFollowers(user.id),
            this.store.likes.countByUser(user.id),
        ]);

        const isFollowing = viewer.kind === 'authenticated'
            ? await this.store.follows.exists(viewer.user.id, user.id)
            : null;

        return {
            user,
            messages,
            stats: { messages: messageCount, following, followers, likes },
            isFollowing,
        };
    }

    /**
     * Updates the acting user's own profile after re-checking their current
     * password. Blank image fields reset to the defaults.
     */
    async updateProfile(user: IUser, input: UpdateProfileInput): Promise<IUser> {
        const verified = await this.auth.authenticate(user.username, input.password);
        if (!verified) {
            throw createError.invalidCredentials('Invalid password.');
        }

        try {
            const updated = await this.store.transaction((tx) =>
                tx.users.update(user.id, {
                    username: input.username,
                    email: input.email,
                    imageUrl: input.imageUrl || config.defaults.imageUrl,
                    headerImageUrl: input.headerImageUrl || config.defaults.headerImageUrl,
                    bio: input.bio,
                    location: input.location,
                })
            );
            if (!updated) {
                throw createError.userNotFound();
            }
            logger.info('Profile updated', { userId: user.id });
            return updated;
        } catch (error) {
            if (error instanceof DuplicateKeyError) {
                throw toDuplicateUserError(error);
            }
            throw error;
        }
    }

    /**
     * Deletes the user and everything hanging off them: likes they gave,
     * likes on their messages, their messages and follow edges in both
     * directions. All of it commits together.
     */
    async deleteUser(user: IUser): Promise<void> {
        await this.store.transaction(async (tx) => {
            const messageIds = await tx.messages.listIdsByAuthor(user.id);
            await tx.likes.deleteByMessages(messageIds);
            await tx.likes.deleteByUser(user.id);
            await tx.messages.deleteByAuthor(user.id);
            await tx.follows.deleteForUser(user.id);
            await tx.users.delete(user.id);
        });
        logger.info('User deleted', { userId: user.id });
    }
}
