/**
 * Raised by a store when a write violates a unique constraint. `field` names
 * the first key of the violated index (e.g. "username", "messageId").
 */
export class DuplicateKeyError extends Error {
    readonly field: string;

    constructor(field: string) {
        super(`Duplicate value for unique key "${field}"`);
        this.name = 'DuplicateKeyError';
        this.field = field;
    }
}

const MONGO_DUPLICATE_KEY = 11000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

export const isMongoDuplicateKeyError = (error: unknown): error is Record<string, unknown> =>
    isRecord(error) && error.code === MONGO_DUPLICATE_KEY;

/**
 * Maps a driver error to a DuplicateKeyError when it is a unique index
 * violation; any other error is returned untouched.
 */
export const translateMongoError = (error: unknown): unknown => {
    if (!isMongoDuplicateKeyError(error)) {
        return error;
    }

    const keyPattern = isRecord(error.keyPattern) ? error.keyPattern : {};
    const [field] = Object.keys(keyPattern);
    return new DuplicateKeyError(field ?? 'unknown');
};
