import { z } from 'zod';
import { countCharacters, MESSAGE_MAX_LENGTH } from '../models/Message.js';

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// Blank optional fields fall back to defaults downstream
const optionalUrl = z
    .string()
    .trim()
    .url('Must be a valid URL')
    .or(z.literal(''))
    .optional()
    .transform((value) => (value ? value : undefined));

const optionalText = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : null));

const username = z
    .string({ required_error: 'Username is required' })
    .trim()
    .min(1, 'Username is required')
    .max(50, 'Username must be at most 50 characters');

const email = z
    .string({ required_error: 'Email is required' })
    .trim()
    .min(1, { message: 'Email is required' })
    .regex(EMAIL_REGEX, { message: 'Invalid email address' });

// Auth schemas
export const signupSchema = z.object({
    username,
    email,
    password: z
        .string({ required_error: 'Password is required' })
        .min(6, 'Password must be at least 6 characters'),
    imageUrl: optionalUrl,
});

export const loginSchema = z.object({
    username,
    password: z
        .string({ required_error: 'Password is required' })
        .min(6, 'Password must be at least 6 characters'),
});

// Message schemas
export const newMessageSchema = z.object({
    text: z
        .string({ required_error: 'Text is required' })
        .refine((text) => countCharacters(text) >= 1, 'Text is required')
        .refine(
            (text) => countCharacters(text) <= MESSAGE_MAX_LENGTH,
            `Text must be at most ${MESSAGE_MAX_LENGTH} characters`
        ),
});

// Profile schemas: the current password authorises the change
export const updateProfileSchema = z.object({
    username,
    email,
    imageUrl: optionalUrl,
    headerImageUrl: optionalUrl,
    bio: optionalText,
    location: optionalText,
    password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

export type SignupInput = z.infer<typeof signupSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type NewMessageInput = z.infer<typeof newMessageSchema>;
export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;
