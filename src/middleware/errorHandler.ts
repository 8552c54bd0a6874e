import { Request, Response, NextFunction } from 'express';
import { ErrorCodes, ErrorMessages, ErrorStatusCodes, ErrorCode } from '../utils/errorCodes.js';
import logger from '../config/logger.js';
import '../types/index.js';

/**
 * Standard API Error Response Structure
 */
interface ErrorResponse {
    success: false;
    error: {
        code: string;
        message: string;
        details?: Record<string, string[]>;
    };
}

/**
 * Custom Application Error class with standardized error codes
 */
export class AppError extends Error {
    statusCode: number;
    code: ErrorCode;
    details?: Record<string, string[]>;
    isOperational: boolean;

    constructor(
        code: ErrorCode,
        message?: string,
        details?: Record<string, string[]>
    ) {
        super(message || ErrorMessages[code]);
        this.code = code;
        this.statusCode = ErrorStatusCodes[code];
        this.details = details;
        this.isOperational = true; // Distinguishes from programming errors
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Error factory functions for common error types
 */
export const createError = {
    // Authentication errors
    unauthorized: (message?: string) =>
        new AppError(ErrorCodes.UNAUTHORIZED, message),

    invalidCredentials: (message?: string) =>
        new AppError(ErrorCodes.INVALID_CREDENTIALS, message),

    // Authorization errors
    notOwner: (resource = 'resource') =>
        new AppError(ErrorCodes.NOT_OWNER, `You can only modify your own ${resource}`),

    selfLike: () =>
        new AppError(ErrorCodes.SELF_LIKE),

    // Validation errors
    validation: (details: Record<string, string[]>) =>
        new AppError(ErrorCodes.VALIDATION_ERROR, 'Validation failed', details),

    invalidInput: (message: string) =>
        new AppError(ErrorCodes.INVALID_INPUT, message),

    messageTooLong: () =>
        new AppError(ErrorCodes.MESSAGE_TOO_LONG),

    // Not found errors
    notFound: (resource = 'Resource') =>
        new AppError(ErrorCodes.NOT_FOUND, `${resource} not found`),

    userNotFound: () =>
        new AppError(ErrorCodes.USER_NOT_FOUND),

    messageNotFound: () =>
        new AppError(ErrorCodes.MESSAGE_NOT_FOUND),

    // Conflict errors
    duplicateEmail: (message?: string) =>
        new AppError(ErrorCodes.DUPLICATE_EMAIL, message),

    duplicateUsername: () =>
        new AppError(ErrorCodes.DUPLICATE_USERNAME),

    messageAlreadyLiked: () =>
        new AppError(ErrorCodes.MESSAGE_ALREADY_LIKED),
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (_req: Request, res: Response): void => {
    res.status(404).json({
        success: false,
        error: {
            code: ErrorCodes.NOT_FOUND,
            message: ErrorMessages[ErrorCodes.NOT_FOUND],
        },
    });
};

/**
 * Errors raised by the body parsers (malformed JSON, oversized body) carry a
 * 4xx `status` and a `type`. They answer 400 INVALID_INPUT.
 */
const fromRequestBodyError = (err: Error): AppError | null => {
    if (
        'type' in err &&
        typeof err.type === 'string' &&
        'status' in err &&
        typeof err.status === 'number' &&
        err.status >= 400 &&
        err.status < 500
    ) {
        return createError.invalidInput('Malformed request body');
    }
    return null;
};

/**
 * Global error handler middleware
 */
export const errorHandler = (
    err: Error | AppError,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const appError = err instanceof AppError ? err : fromRequestBodyError(err);

    const logData = {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        error: err.message,
        stack: err.stack,
    };

    if (appError && appError.isOperational) {
        logger.warn('Operational error', logData);
    } else {
        logger.error('Unexpected error', logData);
    }

    const statusCode = appError ? appError.statusCode : 500;
    const code = appError ? appError.code : ErrorCodes.SERVER_ERROR;
    const message = appError ? appError.message : ErrorMessages[ErrorCodes.SERVER_ERROR];

    const response: ErrorResponse = {
        success: false,
        error: {
            code,
            message,
            ...(appError?.details && { details: appError.details }),
        },
    };

    res.status(statusCode).json(response);
};

export default errorHandler;
