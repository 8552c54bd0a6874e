import { CookieOptions, Response } from 'express';
import config from '../config/index.js';

const cookieOptions: CookieOptions = {
    httpOnly: true,
    secure: config.env === 'production',
    sameSite: 'lax',
    path: '/',
};

export const setSessionCookie = (res: Response, token: string): void => {
    res.cookie(config.session.cookieName, token, {
        ...cookieOptions,
        maxAge: config.session.maxAgeSeconds * 1000,
    });
};

export const clearSessionCookie = (res: Response): void => {
    res.clearCookie(config.session.cookieName, cookieOptions);
};
