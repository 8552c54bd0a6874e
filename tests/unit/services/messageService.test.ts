import { describe, it, expect, beforeEach } from '@jest/globals';
import { createServices, Services } from '../../../src/services/index.js';
import { IUser } from '../../../src/types/index.js';
import { MemoryStore } from '../../utils/memoryStore.js';
import { signupUser } from '../../utils/fixtures.js';

describe('MessageService', () => {
    let store: MemoryStore;
    let services: Services;
    let alice: IUser;
    let bob: IUser;

    beforeEach(async () => {
        store = new MemoryStore();
        services = createServices(store);
        alice = await signupUser(services, 'alice');
        bob = await signupUser(services, 'bob');
    });

    describe('postMessage', () => {
        it('should store a message of exactly 140 characters', async () => {
            const text = 'a'.repeat(140);

            const message = await services.messages.postMessage(alice, text);

            expect(message).toMatchObject({ id: 1, text, userId: alice.id });
            expect(message.timestamp).toBeInstanceOf(Date);
        });

        it('should refuse 141 characters and store nothing', async () => {
            await expect(services.messages.postMessage(alice, 'a'.repeat(141))).rejects.toMatchObject({
                statusCode: 400,
                code: 'MESSAGE_TOO_LONG',
            });
            expect(store.counts().messages).toBe(0);
        });

        it('should accept 140 characters outside the BMP', async () => {
            const text = '\u{1F426}'.repeat(140);

            const message = await services.messages.postMessage(alice, text);

            expect(message.text).toBe(text);
        });

        it('should refuse 141 characters outside the BMP', async () => {
            await expect(services.messages.postMessage(alice, '\u{1F426}'.repeat(141))).rejects.toMatchObject({
                statusCode: 400,
                code: 'MESSAGE_TOO_LONG',
            });
            expect(store.counts().messages).toBe(0);
        });

        it('should refuse empty text', async () => {
            await expect(services.messages.postMessage(alice, '')).rejects.toMatchObject({ statusCode: 400 });
        });
    });

    describe('getMessage', () => {
        it('should report a missing message', async () => {
            await expect(services.messages.getMessage(7)).rejects.toMatchObject({
                statusCode: 404,
                message: 'Warble not found',
            });
        });
    });

    describe('deleteMessage', () => {
        it('should delete the message and the likes on it', async () => {
            const message = await services.messages.postMessage(bob, 'short-lived');
            await services.graph.toggleLike(alice, message.id);

            await services.messages.deleteMessage(bob, message.id);

            expect(store.counts()).toMatchObject({ messages: 0, likes: 0 });
            expect(await services.graph.likedMessageIds(alice.id)).toEqual([]);
        });

        it('should refuse a non-owner and keep the message', async () => {
            const message = await services.messages.postMessage(bob, 'not yours');

            await expect(services.messages.deleteMessage(alice, message.id)).rejects.toMatchObject({
                statusCode: 403,
                code: 'NOT_OWNER',
            });
            expect(await services.messages.getMessage(message.id)).toEqual(message);
        });
    });

    describe('present', () => {
        it('should attach author summaries in order', async () => {
            const first = await services.messages.postMessage(bob, 'one');
            const second = await services.messages.postMessage(alice, 'two');

            const views = await services.messages.present([second, first]);

            expect(views.map((view) => view.author?.username)).toEqual(['alice', 'bob']);
            expect(views[0].author).not.toHaveProperty('passwordHash');
            expect(views[0].author).not.toHaveProperty('email');
        });
    });
});
