/**
 * Standardized API Error Codes and Messages
 *
 * Every failure the API reports carries one of these codes, a default
 * message and the HTTP status it maps to.
 */

// Error code definitions
export const ErrorCodes = {
    // Authentication errors (401)
    UNAUTHORIZED: 'UNAUTHORIZED',
    INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',

    // Authorization errors (403)
    NOT_OWNER: 'NOT_OWNER',
    SELF_LIKE: 'SELF_LIKE',

    // Validation errors (400)
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    INVALID_INPUT: 'INVALID_INPUT',
    MESSAGE_TOO_LONG: 'MESSAGE_TOO_LONG',

    // Resource errors (404)
    NOT_FOUND: 'NOT_FOUND',
    USER_NOT_FOUND: 'USER_NOT_FOUND',
    MESSAGE_NOT_FOUND: 'MESSAGE_NOT_FOUND',

    // Conflict errors (409)
    DUPLICATE_EMAIL: 'DUPLICATE_EMAIL',
    DUPLICATE_USERNAME: 'DUPLICATE_USERNAME',
    MESSAGE_ALREADY_LIKED: 'MESSAGE_ALREADY_LIKED',

    // Rate limiting (429)
    RATE_LIMITED: 'RATE_LIMITED',

    // Server errors (500)
    SERVER_ERROR: 'SERVER_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// Standard error messages for each code
export const ErrorMessages: Record<ErrorCode, string> = {
    [ErrorCodes.UNAUTHORIZED]: 'Access unauthorized.',
    [ErrorCodes.INVALID_CREDENTIALS]: 'Invalid credentials.',

    [ErrorCodes.NOT_OWNER]: 'You can only modify your own resources',
    [ErrorCodes.SELF_LIKE]: 'You cannot like your own warble.',

    [ErrorCodes.VALIDATION_ERROR]: 'Invalid input data',
    [ErrorCodes.INVALID_INPUT]: 'The provided input is invalid',
    [ErrorCodes.MESSAGE_TOO_LONG]: 'Warbles must be between 1 and 140 characters',

    [ErrorCodes.NOT_FOUND]: 'The requested resource was not found',
    [ErrorCodes.USER_NOT_FOUND]: 'User not found',
    [ErrorCodes.MESSAGE_NOT_FOUND]: 'Warble not found',

    [ErrorCodes.DUPLICATE_EMAIL]: 'Email already taken',
    [ErrorCodes.DUPLICATE_USERNAME]: 'Username already taken',
    [ErrorCodes.MESSAGE_ALREADY_LIKED]: 'This warble has already been liked',

    [ErrorCodes.RATE_LIMITED]: 'Too many requests, please try again later',

    [ErrorCodes.SERVER_ERROR]: 'An unexpected error occurred',
};

// HTTP status code mapping
export const ErrorStatusCodes: Record<ErrorCode, number> = {
    [ErrorCodes.UNAUTHORIZED]: 401,
    [ErrorCodes.INVALID_CREDENTIALS]: 401,

    [ErrorCodes.NOT_OWNER]: 403,
    [ErrorCodes.SELF_LIKE]: 403,

    [ErrorCodes.VALIDATION_ERROR]: 400,
    [ErrorCodes.INVALID_INPUT]: 400,
    [ErrorCodes.MESSAGE_TOO_LONG]: 400,

    [ErrorCodes.NOT_FOUND]: 404,
    [ErrorCodes.USER_NOT_FOUND]: 404,
    [ErrorCodes.MESSAGE_NOT_FOUND]: 404,

    [ErrorCodes.DUPLICATE_EMAIL]: 409,
    [ErrorCodes.DUPLICATE_USERNAME]: 409,
    [ErrorCodes.MESSAGE_ALREADY_LIKED]: 409,

    [ErrorCodes.RATE_LIMITED]: 429,

    [ErrorCodes.SERVER_ERROR]: 500,
};
