import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { Request, Response } from 'express';
import { requireUser, withUser, withViewer } from '../auth';
import { AppError } from '../errorHandler';
import { ANONYMOUS } from '../../services/sessionService';
import { IUser } from '../../types';

const alice: IUser = {
    id: 1,
    email: 'alice@example.com',
    username: 'alice',
    passwordHash: 'hash',
    imageUrl: '/static/images/default-pic.png',
    headerImageUrl: '/static/images/warbler-hero.jpg',
    bio: null,
    location: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
};

const buildRequest = (viewer: Request['viewer']): Request => {
    const mockReq: Partial<Request> = { viewer };
    return mockReq as Request;
};

describe('Auth Middleware', () => {
    let res: Response;
    let next: jest.Mock<(error?: unknown) => void>;

    beforeEach(() => {
        const mockRes: Partial<Response> = {};
        res = mockRes as Response;
        next = jest.fn<(error?: unknown) => void>();
    });

    describe('withUser', () => {
        it('should refuse an anonymous viewer without running the handler', async () => {
            const handler = jest.fn(async (_req: Request, _res: Response, _user: IUser) => undefined);

            await withUser(handler)(buildRequest(ANONYMOUS), res, next);

            expect(handler).not.toHaveBeenCalled();
            expect(next).toHaveBeenCalledTimes(1);
            const [error] = next.mock.calls[0];
            expect(error).toBeInstanceOf(AppError);
            expect(error).toMatchObject({ statusCode: 401, code: 'UNAUTHORIZED', message: 'Access unauthorized.' });
        });

        it('should treat a request without a resolved viewer as anonymous', async () => {
            const handler = jest.fn(async (_req: Request, _res: Response, _user: IUser) => undefined);

            await withUser(handler)(buildRequest(undefined), res, next);

            expect(handler).not.toHaveBeenCalled();
            expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 401 });
        });

        it('should hand the acting user to the handler', async () => {
            const handler = jest.fn(async (_req: Request, _res: Response, _user: IUser) => undefined);
            const req = buildRequest({ kind: 'authenticated', user: alice });

            await withUser(handler)(req, res, next);

            expect(handler).toHaveBeenCalledWith(req, res, alice);
            expect(next).not.toHaveBeenCalled();
        });

        it('should forward errors thrown by the handler', async () => {
            const failure = new Error('boom');
            const handler = jest.fn(async (_req: Request, _res: Response, _user: IUser) => {
                throw failure;
            });

            await withUser(handler)(buildRequest({ kind: 'authenticated', user: alice }), res, next);

            expect(next).toHaveBeenCalledWith(failure);
        });
    });

    describe('withViewer', () => {
        it('should run the handler for anonymous viewers too', async () => {
            const handler = jest.fn(async (_req: Request, _res: Response, _viewer: unknown) => undefined);
            const req = buildRequest(undefined);

            await withViewer(handler)(req, res, next);

            expect(handler).toHaveBeenCalledWith(req, res, ANONYMOUS);
        });
    });

    describe('requireUser', () => {
        it('should call next() for an authenticated viewer', () => {
            requireUser(buildRequest({ kind: 'authenticated', user: alice }), res, next);

            expect(next).toHaveBeenCalledWith();
        });

        it('should call next(UnauthorizedError) for an anonymous viewer', () => {
            requireUser(buildRequest(ANONYMOUS), res, next);

            expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 401, code: 'UNAUTHORIZED' });
        });
    });
});
