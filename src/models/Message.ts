import mongoose, { Schema } from 'mongoose';

export const MESSAGE_MAX_LENGTH = 140;

// Length in characters (code points), so an emoji counts once
export const countCharacters = (text: string): number => [...text].length;

export interface MessageRecord {
    _id: number;
    text: string;
    timestamp: Date;
    userId: number;
}

const messageSchema = new Schema<MessageRecord>({
    _id: {
        type: Number,
        required: true,
    },
    text: {
        type: String,
        required: [true, 'Message text is required'],
        minlength: 1,
        validate: {
            validator: (text: string) => countCharacters(text) <= MESSAGE_MAX_LENGTH,
            message: `Message text must be at most ${MESSAGE_MAX_LENGTH} characters`,
        },
    },
    timestamp: {
        type: Date,
        required: true,
        default: Date.now,
        immutable: true,
    },
    userId: {
        type: Number,
        ref: 'User',
        required: true,
    },
});

// Profile pages and the feed both read newest-first per author
messageSchema.index({ userId: 1, timestamp: -1 });
messageSchema.index({ timestamp: -1 });

const Message = mongoose.model<MessageRecord>('Message', messageSchema);

export default Message;
