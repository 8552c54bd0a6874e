import mongoose, { Schema } from 'mongoose';
import config from '../config/index.js';

export interface UserRecord {
    _id: number;
    email: string;
    username: string;
    passwordHash: string;
    imageUrl: string;
    headerImageUrl: string;
    bio: string | null;
    location: string | null;
    createdAt: Date;
    updatedAt: Date;
}

const userSchema = new Schema<UserRecord>(
    {
        _id: {
            type: Number,
            required: true,
        },
        email: {
            type: String,
            required: [true, 'Email is required'],
            unique: true,
            trim: true,
        },
        // Case-sensitive as stored: no lowercasing
        username: {
            type: String,
            required: [true, 'Username is required'],
            unique: true,
            trim: true,
        },
        passwordHash: {
            type: String,
            required: [true, 'Password is required'],
        },
        imageUrl: {
            type: String,
            default: config.defaults.imageUrl,
        },
        headerImageUrl: {
            type: String,
            default: config.defaults.headerImageUrl,
        },
        bio: {
            type: String,
            default: null,
        },
        location: {
            type: String,
            default: null,
        },
    },
    {
        timestamps: true,
    }
);

const User = mongoose.model<UserRecord>('User', userSchema);

export default User;
