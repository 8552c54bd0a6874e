import mongoose, { Schema } from 'mongoose';

export interface LikeRecord {
    userId: number;
    messageId: number;
    createdAt: Date;
}

const likeSchema = new Schema<LikeRecord>(
    {
        userId: {
            type: Number,
            ref: 'User',
            required: true,
        },
        messageId: {
            type: Number,
            ref: 'Message',
            required: true,
        },
    },
    {
        timestamps: { createdAt: true, updatedAt: false },
    }
);

// Legacy rule: a message can be liked by at most one user system-wide
likeSchema.index({ messageId: 1 }, { unique: true });
likeSchema.index({ userId: 1 });

const Like = mongoose.model<LikeRecord>('Like', likeSchema);

export default Like;
