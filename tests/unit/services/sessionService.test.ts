import { describe, it, expect, beforeEach } from '@jest/globals';
import jwt from 'jsonwebtoken';
import { createServices, Services } from '../../../src/services/index.js';
import { ANONYMOUS } from '../../../src/services/sessionService.js';
import { MemoryStore } from '../../utils/memoryStore.js';
import { signupUser } from '../../utils/fixtures.js';

describe('SessionService', () => {
    let services: Services;

    beforeEach(() => {
        services = createServices(new MemoryStore());
    });

    it('should resolve a freshly issued token to its user', async () => {
        const alice = await signupUser(services, 'alice');
        const token = services.sessions.login(alice);

        const viewer = await services.sessions.resolve(token);

        expect(viewer).toEqual({ kind: 'authenticated', user: alice });
    });

    it('should treat a missing token as anonymous', async () => {
        expect(await services.sessions.resolve(undefined)).toBe(ANONYMOUS);
    });

    it('should treat a garbage token as anonymous', async () => {
        expect(await services.sessions.resolve('not-a-token')).toBe(ANONYMOUS);
    });

    it('should treat a token signed with another secret as anonymous', async () => {
        const alice = await signupUser(services, 'alice');
        const forged = jwt.sign({ userId: alice.id }, 'another-secret');

        expect(await services.sessions.resolve(forged)).toBe(ANONYMOUS);
    });

    it('should treat a token without a numeric user id as anonymous', async () => {
        const token = jwt.sign({ userId: 'alice' }, 'test-secret');

        expect(await services.sessions.resolve(token)).toBe(ANONYMOUS);
    });

    it('should treat a token for a deleted user as anonymous', async () => {
        const alice = await signupUser(services, 'alice');
        const token = services.sessions.login(alice);
        await services.users.deleteUser(alice);

        expect(await services.sessions.resolve(token)).toBe(ANONYMOUS);
    });
});
