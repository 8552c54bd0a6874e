import { IUser, IMessage } from '../types/index.js';

export type NewUser = Pick<IUser, 'username' | 'email' | 'passwordHash'> &
    Partial<Pick<IUser, 'imageUrl' | 'headerImageUrl' | 'bio' | 'location'>>;

export type UserChanges = Partial<
    Pick<IUser, 'username' | 'email' | 'imageUrl' | 'headerImageUrl' | 'bio' | 'location'>
>;

export interface NewMessage {
    userId: number;
    text: string;
    timestamp: Date;
}

export interface UserRepository {
    create(data: NewUser): Promise<IUser>;
    findById(id: number): Promise<IUser | null>;
    findByUsername(username: string): Promise<IUser | null>;
    /** Users with the given ids, ordered by id. */
    findByIds(ids: number[]): Promise<IUser[]>;
    /** All users, or those whose username contains `fragment`, ordered by id. */
    search(fragment?: string): Promise<IUser[]>;
    update(id: number, changes: UserChanges): Promise<IUser | null>;
    delete(id: number): Promise<boolean>;
}

export interface MessageRepository {
    create(data: NewMessage): Promise<IMessage>;
    findById(id: number): Promise<IMessage | null>;
    /** Messages by any of the authors, newest first, at most `limit`. */
    listByAuthors(userIds: number[], limit: number): Promise<IMessage[]>;
    /** Messages with the given ids, newest first, at most `limit`. */
    listByIds(ids: number[], limit: number): Promise<IMessage[]>;
    listIdsByAuthor(userId: number): Promise<number[]>;
    countByAuthor(userId: number): Promise<number>;
    delete(id: number): Promise<boolean>;
    deleteByAuthor(userId: number): Promise<number>;
}

export interface FollowRepository {
    exists(followerId: number, followedId: number): Promise<boolean>;
    create(followerId: number, followedId: number): Promise<void>;
    delete(followerId: number, followedId: number): Promise<boolean>;
    followedIds(followerId: number): Promise<number[]>;
    followerIds(followedId: number): Promise<number[]>;
    countFollowing(followerId: number): Promise<number>;
    countFollowers(followedId: number): Promise<number>;
    /** Removes every edge the user is on, as follower or as followed. */
    deleteForUser(userId: number): Promise<number>;
}

export interface LikeRepository {
    exists(userId: number, messageId: number): Promise<boolean>;
    create(userId: number, messageId: number): Promise<void>;
    delete(userId: number, messageId: number): Promise<boolean>;
    likedMessageIds(userId: number): Promise<number[]>;
    countByUser(userId: number): Promise<number>;
    deleteByUser(userId: number): Promise<number>;
    deleteByMessages(messageIds: number[]): Promise<number>;
}

/**
 * Persistence boundary. Services receive a store and never touch models
 * directly, so the same rules run over MongoDB or an in-process store.
 */
export interface DataStore {
    users: UserRepository;
    messages: MessageRepository;
    follows: FollowRepository;
    likes: LikeRepository;
    /**
     * Runs `work` as one unit: every mutation made through the store it
     * receives commits together or not at all. Nested calls join the
     * enclosing unit.
     */
    transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T>;
}
