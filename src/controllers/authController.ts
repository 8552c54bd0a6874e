import { Request, Response, NextFunction } from 'express';
import { createError } from '../middleware/errorHandler.js';
import { ANONYMOUS } from '../services/sessionService.js';
import { Services } from '../services/index.js';
import { toAccountView } from '../utils/serializers.js';
import { clearSessionCookie, setSessionCookie } from '../utils/sessionCookie.js';
import { LoginInput, SignupInput } from '../utils/validators.js';

export const createAuthController = ({ auth, sessions }: Services) => {
    // Create the account and log it in
    const signup = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const input: SignupInput = req.body;
            const user = await auth.signup(input);
            setSessionCookie(res, sessions.login(user));

            res.status(201).json({
                success: true,
                data: { user: toAccountView(user) },
            });
        } catch (error) {
            next(error);
        }
    };

    const login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { username, password }: LoginInput = req.body;
            const user = await auth.authenticate(username, password);
            if (!user) {
                throw createError.invalidCredentials();
            }
            setSessionCookie(res, sessions.login(user));

            res.json({
                success: true,
                data: {
                    user: toAccountView(user),
                    message: `Hello, ${user.username}!`,
                },
            });
        } catch (error) {
            next(error);
        }
    };

    // Idempotent: an anonymous caller gets the same answer
    const logout = (req: Request, res: Response): void => {
        clearSessionCookie(res);
        req.viewer = ANONYMOUS;

        res.json({
            success: true,
            data: { message: 'You have been logged out.' },
        });
    };

    return { signup, login, logout };
};
