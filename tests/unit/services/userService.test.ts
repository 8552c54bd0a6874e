import { describe, it, expect, beforeEach } from '@jest/globals';
import { createServices, Services } from '../../../src/services/index.js';
import { ANONYMOUS } from '../../../src/services/sessionService.js';
import { IUser } from '../../../src/types/index.js';
import { MemoryStore } from '../../utils/memoryStore.js';
import { PASSWORD, signupUser } from '../../utils/fixtures.js';

describe('UserService', () => {
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

    describe('listUsers', () => {
        it('should list every user ordered by id', async () => {
            const users = await services.users.listUsers();

            expect(users.map((user) => user.username)).toEqual(['alice', 'bob']);
        });

        it('should filter by username fragment', async () => {
            const users = await services.users.listUsers('li');

            expect(users.map((user) => user.username)).toEqual(['alice']);
        });
    });

    describe('getProfile', () => {
        it('should count messages, follows and likes', async () => {
            const message = await services.messages.postMessage(bob, 'from bob');
            await services.messages.postMessage(alice, 'from alice');
            await services.graph.follow(alice, bob.id);
            await services.graph.toggleLike(alice, message.id);

            const profile = await services.users.getProfile(alice.id, { kind: 'authenticated', user: bob });

            expect(profile.stats).toEqual({ messages: 1, following: 1, followers: 0, likes: 1 });
            expect(profile.messages.map((m) => m.text)).toEqual(['from alice']);
            expect(profile.isFollowing).toBe(false);
        });

        it('should report whether the viewer follows the user', async () => {
            await services.graph.follow(alice, bob.id);

            const profile = await services.users.getProfile(bob.id, { kind: 'authenticated', user: alice });

            expect(profile.isFollowing).toBe(true);
        });

        it('should leave isFollowing null for anonymous viewers', async () => {
            const profile = await services.users.getProfile(bob.id, ANONYMOUS);

            expect(profile.isFollowing).toBeNull();
        });

        it('should report an unknown user', async () => {
            await expect(services.users.getProfile(99, ANONYMOUS)).rejects.toMatchObject({
                statusCode: 404,
                code: 'USER_NOT_FOUND',
            });
        });
    });

    describe('updateProfile', () => {
        const changes = {
            username: 'alice2',
            email: 'alice2@example.com',
            imageUrl: undefined,
            headerImageUrl: undefined,
            bio: 'Bird watcher',
            location: null,
        };

        it('should apply the changes with the right password', async () => {
            const updated = await services.users.updateProfile(alice, { ...changes, password: PASSWORD });

            expect(updated).toMatchObject({
                id: alice.id,
                username: 'alice2',
                email: 'alice2@example.com',
                imageUrl: '/static/images/default-pic.png',
                headerImageUrl: '/static/images/warbler-hero.jpg',
                bio: 'Bird watcher',
                location: null,
            });
        });

        it('should refuse a wrong password and change nothing', async () => {
            await expect(
                services.users.updateProfile(alice, { ...changes, password: 'wrong-password' })
            ).rejects.toMatchObject({ statusCode: 401, code: 'INVALID_CREDENTIALS', message: 'Invalid password.' });

            expect((await services.users.getUser(alice.id)).username).toBe('alice');
        });

        it('should refuse a username that belongs to someone else', async () => {
            await expect(
                services.users.updateProfile(alice, { ...changes, username: 'bob', password: PASSWORD })
            ).rejects.toMatchObject({ statusCode: 409, code: 'DUPLICATE_USERNAME' });

            expect((await services.users.getUser(alice.id)).email).toBe('alice@example.com');
        });
    });

    describe('deleteUser', () => {
        it('should remove the user with their messages, likes and follows', async () => {
            const carol = await signupUser(services, 'carol');
            const aliceMessage = await services.messages.postMessage(alice, 'going away');
            const bobMessage = await services.messages.postMessage(bob, 'staying');
            await services.graph.toggleLike(carol, aliceMessage.id);
            await services.graph.toggleLike(alice, bobMessage.id);
            await services.graph.follow(alice, bob.id);
            await services.graph.follow(bob, alice.id);
            await services.graph.follow(carol, bob.id);

            await services.users.deleteUser(alice);

            expect(store.counts()).toEqual({ users: 2, messages: 1, follows: 1, likes: 0 });
            await expect(services.users.getUser(alice.id)).rejects.toMatchObject({ statusCode: 404 });
            expect(await services.graph.likedMessageIds(carol.id)).toEqual([]);
            expect((await services.graph.followersOf(bob.id)).map((user) => user.username)).toEqual(['carol']);
        });
    });
});
