import mongoose, { ClientSession } from 'mongoose';
import User, { UserRecord } from '../models/User.js';
import Message, { MessageRecord } from '../models/Message.js';
import Follow, { FollowRecord } from '../models/Follow.js';
import Like, { LikeRecord } from '../models/Like.js';
import Counter, { CounterRecord } from '../models/Counter.js';
import { IUser, IMessage } from '../types/index.js';
import { translateMongoError } from './errors.js';
import {
    DataStore,
    FollowRepository,
    LikeRepository,
    MessageRepository,
    NewMessage,
    NewUser,
    UserChanges,
    UserRepository,
} from './types.js';

export const escapeRegExp = (value: string): string =>
    value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const toUser = (record: UserRecord): IUser => ({
    id: record._id,
    email: record.email,
    username: record.username,
    passwordHash: record.passwordHash,
    imageUrl: record.imageUrl,
    headerImageUrl: record.headerImageUrl,
    bio: record.bio ?? null,
    location: record.location ?? null,
    createdAt: record.createdAt,
});

export const toMessage = (record: MessageRecord): IMessage => ({
    id: record._id,
    text: record.text,
    timestamp: record.timestamp,
    userId: record.userId,
});

// Atomically hands out the next integer id for a collection
export const nextSequence = async (name: string, session: ClientSession | null): Promise<number> => {
    const counter = await Counter.findOneAndUpdate(
        { _id: name },
        { $inc: { seq: 1 } },
        { new: true, upsert: true, session }
    ).lean<CounterRecord | null>();

    if (!counter) {
        throw new Error(`Sequence "${name}" could not be advanced`);
    }
    return counter.seq;
};

class MongoUserRepository implements UserRepository {
    constructor(private readonly session: ClientSession | null) {}

    async create(data: NewUser): Promise<IUser> {
        try {
            const id = await nextSequence('users', this.session);
            const user = new User({
                _id: id,
                username: data.username,
                email: data.email,
                passwordHash: data.passwordHash,
                ...(data.imageUrl && { imageUrl: data.imageUrl }),
                ...(data.headerImageUrl && { headerImageUrl: data.headerImageUrl }),
                bio: data.bio ?? null,
                location: data.location ?? null,
            });
            await user.save({ session: this.session });
            return toUser(user.toObject());
        } catch (error) {
            throw translateMongoError(error);
        }
    }

    async findById(id: number): Promise<IUser | null> {
        const record = await User.findById(id).session(this.session).lean<UserRecord | null>();
        return record ? toUser(record) : null;
    }

    async findByUsername(username: string): Promise<IUser | null> {
        const record = await User.findOne({ username }).session(this.session).lean<UserRecord | null>();
        return record ? toUser(record) : null;
    }

    async findByIds(ids: number[]): Promise<IUser[]> {
        if (ids.length === 0) {
            return [];
        }
        const records = await User.find({ _id: { $in: ids } })
            .sort({ _id: 1 })
            .session(this.session)
            .lean<UserRecord[]>();
        return records.map(toUser);
    }

    async search(fragment?: string): Promise<IUser[]> {
        const filter = fragment ? { username: { $regex: escapeRegExp(fragment) } } : {};
        const records = await User.find(filter)
            .sort({ _id: 1 })
            .session(this.session)
            .lean<UserRecord[]>();
        return records.map(toUser);
    }

    async update(id: number, changes: UserChanges): Promise<IUser | null> {
        try {
            const record = await User.findByIdAndUpdate(
                id,
                { $set: changes },
                { new: true, runValidators: true, session: this.session }
            ).lean<UserRecord | null>();
            return record ? toUser(record) : null;
        } catch (error) {
            throw translateMongoError(error);
        }
    }

    async delete(id: number): Promise<boolean> {
        const result = await User.deleteOne({ _id: id }, { session: this.session ?? undefined });
        return result.deletedCount > 0;
    }
}

class MongoMessageRepository implements MessageRepository {
    constructor(private readonly session: ClientSession | null) {}

    async create(data: NewMessage): Promise<IMessage> {
        const id = await nextSequence('messages', this.session);
        const message = new Message({
            _id: id,
            text: data.text,
            timestamp: data.timestamp,
            userId: data.userId,
        });
        await message.save({ session: this.session });
        return toMessage(message.toObject());
    }

    async findById(id: number): Promise<IMessage | null> {
        const record = await Message.findById(id).session(this.session).lean<MessageRecord | null>();
        return record ? toMessage(record) : null;
    }

    async listByAuthors(userIds: number[], limit: number): Promise<IMessage[]> {
        if (userIds.length === 0) {
            return [];
        }
        const records = await Message.find({ userId: { $in: userIds } })
            .sort({ timestamp: -1, _id: -1 })
            .limit(limit)
            .session(this.session)
            .lean<MessageRecord[]>();
        return records.map(toMessage);
    }

    async listByIds(ids: number[], limit: number): Promise<IMessage[]> {
        if (ids.length === 0) {
            return [];
        }
        const records = await Message.find({ _id: { $in: ids } })
            .sort({ timestamp: -1, _id: -1 })
            .limit(limit)
            .session(this.session)
            .lean<MessageRecord[]>();
        return records.map(toMessage);
    }

    async listIdsByAuthor(userId: number): Promise<number[]> {
        const records = await Message.find({ userId }, { _id: 1 })
            .session(this.session)
            .lean<Pick<MessageRecord, '_id'>[]>();
        return records.map((record) => record._id);
    }

    async countByAuthor(userId: number): Promise<number> {
        return await Message.countDocuments({ userId }).session(this.session);
    }

    async delete(id: number): Promise<boolean> {
        const result = await Message.deleteOne({ _id: id }, { session: this.session ?? undefined });
        return result.deletedCount > 0;
    }

    async deleteByAuthor(userId: number): Promise<number> {
        const result = await Message.deleteMany({ userId }, { session: this.session ?? undefined });
        return result.deletedCount;
    }
}

class MongoFollowRepository implements FollowRepository {
    constructor(private readonly session: ClientSession | null) {}

    async exists(followerId: number, followedId: number): Promise<boolean> {
        const found = await Follow.exists({ followerId, followedId }).session(this.session);
        return found !== null;
    }

    async create(followerId: number, followedId: number): Promise<void> {
        try {
            await Follow.create([{ followerId, followedId }], { session: this.session });
        } catch (error) {
            throw translateMongoError(error);
        }
    }

    async delete(followerId: number, followedId: number): Promise<boolean> {
        const result = await Follow.deleteOne({ followerId, followedId }, { session: this.session ?? undefined });
        return result.deletedCount > 0;
    }

    async followedIds(followerId: number): Promise<number[]> {
        const edges = await Follow.find({ followerId })
            .sort({ createdAt: 1 })
            .session(this.session)
            .lean<FollowRecord[]>();
        return edges.map((edge) => edge.followedId);
    }

    async followerIds(followedId: number): Promise<number[]> {
        const edges = await Follow.find({ followedId })
            .sort({ createdAt: 1 })
            .session(this.session)
            .lean<FollowRecord[]>();
        return edges.map((edge) => edge.followerId);
    }

    async countFollowing(followerId: number): Promise<number> {
        return await Follow.countDocuments({ followerId }).session(this.session);
    }

    async countFollowers(followedId: number): Promise<number> {
        return await Follow.countDocuments({ followedId }).session(this.session);
    }

    async deleteForUser(userId: number): Promise<number> {
        const result = await Follow.deleteMany(
            { $or: [{ followerId: userId }, { followedId: userId }] },
            { session: this.session ?? undefined }
        );
        return result.deletedCount;
    }
}

class MongoLikeRepository implements LikeRepository {
    constructor(private readonly session: ClientSession | null) {}

    async exists(userId: number, messageId: number): Promise<boolean> {
        const found = await Like.exists({ userId, messageId }).session(this.session);
        return found !== null;
    }

    async create(userId: number, messageId: number): Promise<void> {
        try {
            await Like.create([{ userId, messageId }], { session: this.session });
        } catch (error) {
            throw translateMongoError(error);
        }
    }

    async delete(userId: number, messageId: number): Promise<boolean> {
        const result = await Like.deleteOne({ userId, messageId }, { session: this.session ?? undefined });
        return result.deletedCount > 0;
    }

    async likedMessageIds(userId: number): Promise<number[]> {
        const likes = await Like.find({ userId }).session(this.session).lean<LikeRecord[]>();
        return likes.map((like) => like.messageId);
    }

    async countByUser(userId: number): Promise<number> {
        return await Like.countDocuments({ userId }).session(this.session);
    }

    async deleteByUser(userId: number): Promise<number> {
        const result = await Like.deleteMany({ userId }, { session: this.session ?? undefined });
        return result.deletedCount;
    }

    async deleteByMessages(messageIds: number[]): Promise<number> {
        if (messageIds.length === 0) {
            return 0;
        }
        const result = await Like.deleteMany({ messageId: { $in: messageIds } }, { session: this.session ?? undefined });
        return result.deletedCount;
    }
}

/**
 * DataStore over the mongoose models. A store built without a session runs
 * each query on its own; `transaction` opens a session and hands `work` a
 * store whose every query is bound to it.
 */
export class MongoStore implements DataStore {
    readonly users: UserRepository;
    readonly messages: MessageRepository;
    readonly follows: FollowRepository;
    readonly likes: LikeRepository;

    constructor(private readonly session: ClientSession | null = null) {
        this.users = new MongoUserRepository(session);
        this.messages = new MongoMessageRepository(session);
        this.follows = new MongoFollowRepository(session);
        this.likes = new MongoLikeRepository(session);
    }

    async transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T> {
        if (this.session) {
            return work(this);
        }

        const session = await mongoose.startSession();
        const box: { result?: { value: T } } = {};
        try {
            // withTransaction may re-run the callback on transient errors
            await session.withTransaction(async () => {
                box.result = { value: await work(new MongoStore(session)) };
            });
        } finally {
            await session.endSession();
        }

        if (!box.result) {
            throw new Error('Transaction completed without a result');
        }
        return box.result.value;
    }
}

export const createMongoStore = (): DataStore => new MongoStore();
