import { Request, Response, NextFunction, RequestHandler } from 'express';
import config from '../config/index.js';
import { IUser, Viewer } from '../types/index.js';
import { SessionService, ANONYMOUS } from '../services/sessionService.js';
import { createError } from './errorHandler.js';

const readSessionToken = (req: Request): string | undefined => {
    const fromCookie: unknown = req.cookies?.[config.session.cookieName];
    if (typeof fromCookie === 'string' && fromCookie) {
        return fromCookie;
    }
    if (req.headers.authorization?.startsWith('Bearer ')) {
        return req.headers.authorization.split(' ')[1];
    }
    return undefined;
};

/**
 * Resolves the acting identity once per request and attaches it as
 * `req.viewer`. Never rejects: a bad or stale token means anonymous.
 */
export const resolveViewer = (sessions: SessionService): RequestHandler => {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
        try {
            req.viewer = await sessions.resolve(readSessionToken(req));
            next();
        } catch (error) {
            next(error);
        }
    };
};

export const currentViewer = (req: Request): Viewer => req.viewer ?? ANONYMOUS;

export type UserHandler = (
    req: Request,
    res: Response,
    user: IUser
) => Promise<void>;

/**
 * The single authorization gate. Wraps a privileged handler so it runs only
 * for an authenticated viewer, receiving the acting user explicitly.
 * Anonymous callers are refused before the handler reads or writes anything.
 */
export const withUser = (handler: UserHandler): RequestHandler => {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const viewer = currentViewer(req);
        if (viewer.kind !== 'authenticated') {
            return next(createError.unauthorized());
        }

        try {
            await handler(req, res, viewer.user);
        } catch (error) {
            next(error);
        }
    };
};

export type ViewerHandler = (
    req: Request,
    res: Response,
    viewer: Viewer
) => Promise<void>;

// Public handlers that still want to know who is looking
export const withViewer = (handler: ViewerHandler): RequestHandler => {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            await handler(req, res, currentViewer(req));
        } catch (error) {
            next(error);
        }
    };
};

// Route-level form of the gate, for routes that validate input before the handler runs
export const requireUser = (req: Request, _res: Response, next: NextFunction): void => {
    if (currentViewer(req).kind !== 'authenticated') {
        return next(createError.unauthorized());
    }
    next();
};
