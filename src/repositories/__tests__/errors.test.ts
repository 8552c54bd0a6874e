import { describe, it, expect } from '@jest/globals';
import { DuplicateKeyError, isMongoDuplicateKeyError, translateMongoError } from '../errors';

describe('Mongo error translation', () => {
    it('should recognise a duplicate key error by its code', () => {
        expect(isMongoDuplicateKeyError({ code: 11000 })).toBe(true);
        expect(isMongoDuplicateKeyError({ code: 121 })).toBe(false);
        expect(isMongoDuplicateKeyError(null)).toBe(false);
    });

    it('should name the first key of the violated index', () => {
        const translated = translateMongoError({ code: 11000, keyPattern: { followerId: 1, followedId: 1 } });

        expect(translated).toBeInstanceOf(DuplicateKeyError);
        expect(translated).toHaveProperty('field', 'followerId');
    });

    it('should fall back to "unknown" without a key pattern', () => {
        const translated = translateMongoError({ code: 11000 });

        expect(translated).toHaveProperty('field', 'unknown');
    });

    it('should pass other errors through untouched', () => {
        const original = new Error('connection reset');

        expect(translateMongoError(original)).toBe(original);
    });
});
