import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import config from '../config/index.js';
import { ErrorCodes } from '../utils/errorCodes.js';
import { currentViewer } from './auth.js';

interface RateLimitConfig {
    windowMs: number;
    limit: number;
    message: string;
}

type LimiterName = 'login' | 'signup' | 'postMessage' | 'api';

const rateLimitConfigs: Record<LimiterName, RateLimitConfig> = {
    login: {
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 5,
        message: 'Too many login attempts, please try again after 15 minutes',
    },
    signup: {
        windowMs: 60 * 60 * 1000, // 1 hour
        limit: 3,
        message: 'Too many signup attempts, please try again later',
    },
    postMessage: {
        windowMs: 60 * 60 * 1000, // 1 hour
        limit: 60,
        message: 'Too many warbles, please slow down',
    },
    api: {
        windowMs: 60 * 1000, // 1 minute
        limit: 100,
        message: 'Too many requests, please slow down',
    },
};

const createRateLimiter = (name: LimiterName): RateLimitRequestHandler => {
    const conf = rateLimitConfigs[name];

    // Lenient outside production
    const isProduction = config.env === 'production';

    return rateLimit({
        windowMs: isProduction ? conf.windowMs : 1000,
        limit: isProduction ? conf.limit : 1000,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: {
                code: ErrorCodes.RATE_LIMITED,
                message: conf.message,
            },
        },
        keyGenerator: (req) => {
            const viewer = currentViewer(req);
            if (viewer.kind === 'authenticated') {
                return `user:${viewer.user.id}`;
            }
            return `ip:${req.ip || 'anonymous'}`;
        },
        validate: false,
        skip: (req) => req.method === 'OPTIONS',
    });
};

export const loginLimiter = createRateLimiter('login');
export const signupLimiter = createRateLimiter('signup');
export const postMessageLimiter = createRateLimiter('postMessage');
export const apiLimiter = createRateLimiter('api');
