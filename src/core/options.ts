/**
 * Construction options and their schemas.
 *
 * Options are validated once, when a middleware is built. A failure throws
 * {@link MiddlewareOptionsError} listing every offending field.
 *
 * @module
 */
import { z } from 'zod';
import { MiddlewareOptionsError } from './errors.js';

// ── MiddlewareState ──────────────────────────────────────

export const MiddlewareStateOptionsSchema = z.object({
    /** Named argument under which the state is forwarded to `next`. */
    key: z.string().min(1, 'key must be a non-empty string').optional(),
}).strict();

export type MiddlewareStateOptions = z.input<typeof MiddlewareStateOptionsSchema>;

// ── Parsing ──────────────────────────────────────────────

/**
 * Parse `input` against `schema`, throwing a {@link MiddlewareOptionsError}
 * tagged with `target` on failure.
 */
export function parseOptions<TSchema extends z.ZodTypeAny>(
    target: string,
    schema: TSchema,
    input: unknown,
): z.output<TSchema> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new MiddlewareOptionsError(target, result.error);
    }
    return result.data;
}
