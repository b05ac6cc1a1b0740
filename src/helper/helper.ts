import type { z } from 'zod';
import { ValidationError, toValidationIssues } from './errors';

// --- HELPER: Input Validation ---
/**
 * Validate caller parameters against an endpoint schema
 * Runs every check before anything touches the network.
 *
 * @returns Parsed parameters (regions lower-cased, defaults applied)
 * @throws ValidationError listing every failed check
 */
export function validateParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
        throw new ValidationError(toValidationIssues(parsed.error));
    }
    return parsed.data;
}

// --- HELPER: Log Formatting ---
// PUUIDs are 78 characters; the prefix is enough to spot a player in logs
export const shortenPuuid = (puuid: string): string => `${puuid.substring(0, 10)}...`;
