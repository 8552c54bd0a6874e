import mongoose, { Schema } from 'mongoose';

export interface FollowRecord {
    followerId: number;
    followedId: number;
    createdAt: Date;
}

const followSchema = new Schema<FollowRecord>(
    {
        followerId: {
            type: Number,
            ref: 'User',
            required: true,
        },
        followedId: {
            type: Number,
            ref: 'User',
            required: true,
        },
    },
    {
        timestamps: { createdAt: true, updatedAt: false },
    }
);

// A user may follow another at most once
followSchema.index({ followerId: 1, followedId: 1 }, { unique: true });
// Both directions are queried
followSchema.index({ followerId: 1 });
followSchema.index({ followedId: 1 });

const Follow = mongoose.model<FollowRecord>('Follow', followSchema);

export default Follow;
