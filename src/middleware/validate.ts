import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError, createError } from './errorHandler.js';

export const toValidationError = (error: z.ZodError): AppError => {
    const details: Record<string, string[]> = {};
    error.issues.forEach((issue) => {
        const path = issue.path.join('.');
        if (!details[path]) {
            details[path] = [];
        }
        details[path].push(issue.message);
    });
    return createError.validation(details);
};

// Replaces req.body with the parsed value (trimmed, defaults applied)
export const validate = (schema: z.ZodType) => {
    return (req: Request, _res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            return next(toValidationError(result.error));
        }
        req.body = result.data;
        next();
    };
};
