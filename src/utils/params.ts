import { createError } from '../middleware/errorHandler.js';

// Route ids are positive integers; anything else cannot name a record
export const parseId = (raw: string | undefined, resource = 'Resource'): number => {
    if (!raw || !/^\d+$/.test(raw)) {
        throw createError.notFound(resource);
    }
    const id = Number(raw);
    if (!Number.isSafeInteger(id) || id < 1) {
        throw createError.notFound(resource);
    }
    return id;
};
