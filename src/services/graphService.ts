import config from '../config/index.js';
import logger from '../config/logger.js';
import { createError } from '../middleware/errorHandler.js';
import { DuplicateKeyError } from '../repositories/errors.js';
import { DataStore } from '../repositories/types.js';
import { FollowResult, IMessage, IUser, LikeResult } from '../types/index.js';

/**
 * Follow graph and likes. The follow relation is a single edge set; both
 * directions are answered by querying it, never by keeping two copies.
 */
export class GraphService {
    constructor(private readonly store: DataStore) {}

    // Is `user` following `other`?
    async isFollowing(user: IUser, other: IUser): Promise<boolean> {
        return this.store.follows.exists(user.id, other.id);
    }

    // Is `user` followed by `other`?
    async isFollowedBy(user: IUser, other: IUser): Promise<boolean> {
        return this.store.follows.exists(other.id, user.id);
    }

    async follow(follower: IUser, followedId: number): Promise<FollowResult> {
        if (follower.id === followedId) {
            throw createError.invalidInput('You cannot follow yourself.');
        }

        try {
            return await this.store.transaction(async (tx) => {
                const followed = await tx.users.findById(followedId);
                if (!followed) {
                    throw createError.userNotFound();
                }

                if (await tx.follows.exists(follower.id, followedId)) {
                    return { following: true, changed: false };
                }

                await tx.follows.create(follower.id, followedId);
                logger.info('User followed', { followerId: follower.id, followedId });
                return { following: true, changed: true };
            });
        } catch (error) {
            // A concurrent request inserted the same edge first
            if (error instanceof DuplicateKeyError) {
                return { following: true, changed: false };
            }
            throw error;
        }
    }

    // Removing an edge that is not there is a no-op
    async unfollow(follower: IUser, followedId: number): Promise<FollowResult> {
        const removed = await this.store.transaction((tx) => tx.follows.delete(follower.id, followedId));
        if (removed) {
            logger.info('User unfollowed', { followerId: follower.id, followedId });
        }
        return { following: false, changed: removed };
    }

    async followingOf(userId: number): Promise<IUser[]> {
        const ids = await this.store.follows.followedIds(userId);
        return this.store.users.findByIds(ids);
    }

    async followersOf(userId: number): Promise<IUser[]> {
        const ids = await this.store.follows.followerIds(userId);
        return this.store.users.findByIds(ids);
    }

    /**
     * Likes the message, or unlikes it when already liked. Authors may not
     * like their own messages. A message can hold only one like system-wide,
     * so liking one that someone else already liked is refused.
     */
    async toggleLike(user: IUser, messageId: number): Promise<LikeResult> {
        try {
            return await this.store.transaction(async (tx) => {
                const message = await tx.messages.findById(messageId);
                if (!message) {
                    throw createError.messageNotFound();
                }

                if (message.userId === user.id) {
                    throw createError.selfLike();
                }

                if (await tx.likes.exists(user.id, messageId)) {
                    await tx.likes.delete(user.id, messageId);
                    logger.debug('Message unliked', { userId: user.id, messageId });
                    return { liked: false };
                }

                await tx.likes.create(user.id, messageId);
                logger.debug('Message liked', { userId: user.id, messageId });
                return { liked: true };
            });
        } catch (error) {
            if (error instanceof DuplicateKeyError) {
                throw createError.messageAlreadyLiked();
            }
            throw error;
        }
    }

    /**
     * Messages authored by the user or by anyone they follow, newest first.
     * Each message appears once even if its author is reachable twice.
     */
    async feedFor(user: IUser, limit = config.pagination.messageLimit): Promise<IMessage[]> {
        const followedIds = await this.store.follows.followedIds(user.id);
        const authorIds = [...new Set([user.id, ...followedIds])];
        return this.store.messages.listByAuthors(authorIds, limit);
    }

    async messagesLikedBy(userId: number, limit = config.pagination.messageLimit): Promise<IMessage[]> {
        const messageIds = await this.store.likes.likedMessageIds(userId);
        return this.store.messages.listByIds(messageIds, limit);
    }

    async likedMessageIds(userId: number): Promise<number[]> {
        return this.store.likes.likedMessageIds(userId);
    }
}
