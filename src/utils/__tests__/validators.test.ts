import { describe, it, expect } from '@jest/globals';
import { loginSchema, newMessageSchema, signupSchema, updateProfileSchema } from '../validators';

describe('Validation Schemas', () => {
    describe('signupSchema', () => {
        const validSignup = {
            username: 'alice',
            email: 'alice@example.com',
            password: 'password123',
        };

        it('should accept a valid signup and leave imageUrl unset', () => {
            const result = signupSchema.safeParse(validSignup);

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data).toEqual({ ...validSignup, imageUrl: undefined });
            }
        });

        it('should trim the username', () => {
            const result = signupSchema.safeParse({ ...validSignup, username: '  alice  ' });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.username).toBe('alice');
            }
        });

        it('should treat a blank imageUrl as absent', () => {
            const result = signupSchema.safeParse({ ...validSignup, imageUrl: '' });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.imageUrl).toBeUndefined();
            }
        });

        it('should reject a password shorter than 6 characters', () => {
            const result = signupSchema.safeParse({ ...validSignup, password: '12345' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].path).toEqual(['password']);
                expect(result.error.issues[0].message).toBe('Password must be at least 6 characters');
            }
        });

        it('should reject a malformed email', () => {
            const result = signupSchema.safeParse({ ...validSignup, email: 'not-an-email' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe('Invalid email address');
            }
        });

        it('should reject a missing username', () => {
            const result = signupSchema.safeParse({ email: 'a@example.com', password: 'password123' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe('Username is required');
            }
        });
    });

    describe('loginSchema', () => {
        it('should require a password', () => {
            const result = loginSchema.safeParse({ username: 'alice' });

            expect(result.success).toBe(false);
        });
    });

    describe('newMessageSchema', () => {
        it('should accept exactly 140 characters', () => {
            expect(newMessageSchema.safeParse({ text: 'a'.repeat(140) }).success).toBe(true);
        });

        it('should reject 141 characters', () => {
            const result = newMessageSchema.safeParse({ text: 'a'.repeat(141) });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe('Text must be at most 140 characters');
            }
        });

        it('should count characters outside the BMP once each', () => {
            expect(newMessageSchema.safeParse({ text: '\u{1F426}'.repeat(140) }).success).toBe(true);

            const result = newMessageSchema.safeParse({ text: '\u{1F426}'.repeat(141) });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues.map((issue) => issue.message)).toEqual([
                    'Text must be at most 140 characters',
                ]);
            }
        });

        it('should reject empty text', () => {
            expect(newMessageSchema.safeParse({ text: '' }).success).toBe(false);
        });
    });

    describe('updateProfileSchema', () => {
        it('should turn blank bio and location into null', () => {
            const result = updateProfileSchema.safeParse({
                username: 'alice',
                email: 'alice@example.com',
                bio: '   ',
                password: 'password123',
            });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.bio).toBeNull();
                expect(result.data.location).toBeNull();
            }
        });

        it('should require the current password', () => {
            const result = updateProfileSchema.safeParse({ username: 'alice', email: 'alice@example.com' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].path).toEqual(['password']);
            }
        });
    });
});
