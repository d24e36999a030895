import { ValidationError } from './errors.js';

/**
 * Trim a search query, rejecting one that is empty or whitespace only.
 */
export function validateQuery(query: string): string {
    const trimmed = query.trim();
    if (!trimmed) {
        throw new ValidationError('Query cannot be empty or whitespace.');
    }
    return trimmed;
}

/**
 * Largest page esearch will return in one call.
 */
export const MAX_RESULT_LIMIT = 10000;

/**
 * Result limits must be positive integers no larger than `MAX_RESULT_LIMIT`.
 */
export function validateLimit(limit: number): number {
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new ValidationError(`Result limit must be a positive integer, got ${limit}`);
    }
    if (limit > MAX_RESULT_LIMIT) {
        throw new ValidationError(`Result limit must be at most ${MAX_RESULT_LIMIT}, got ${limit}`);
    }
    return limit;
}
