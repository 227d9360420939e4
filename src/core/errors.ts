/**
 * Construction Errors
 *
 * Thrown immediately while a pipeline is being assembled, never while it
 * runs. Errors raised by middleware or continuations at run time are not
 * wrapped: they reach the caller unchanged.
 *
 * @example
 * ```typescript
 * try {
 *     chain.add(notAMiddleware);
 * } catch (e) {
 *     if (e instanceof MiddlewareError) {
 *         console.log(e.code); // "NOT_MIDDLEWARE"
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';

export type MiddlewareErrorCode = 'NOT_ASYNC_FUNCTION' | 'NOT_MIDDLEWARE' | 'INVALID_OPTIONS';

/** Base class for every error this library throws. */
export class MiddlewareError extends Error {
    readonly code: MiddlewareErrorCode;

    constructor(message: string, code: MiddlewareErrorCode, options?: ErrorOptions) {
        super(message, options);
        this.name = 'MiddlewareError';
        this.code = code;
    }
}

/** A function handed to the function adapter is not an `async` function. */
export class NotAsyncFunctionError extends MiddlewareError {
    constructor(received: unknown) {
        super(`Not an async function: ${describe(received)}`, 'NOT_ASYNC_FUNCTION');
        this.name = 'NotAsyncFunctionError';
    }
}

/** A value added to a collection is not a `Middleware` instance. */
export class NotMiddlewareError extends MiddlewareError {
    constructor(received: unknown) {
        super(`Not a middleware: ${describe(received)}`, 'NOT_MIDDLEWARE');
        this.name = 'NotMiddlewareError';
    }
}

/**
 * Construction options failed schema validation.
 * The original `ZodError` is kept as `cause`.
 */
export class MiddlewareOptionsError extends MiddlewareError {
    /** Which construct rejected its options, e.g. `"MiddlewareState"`. */
    readonly target: string;

    constructor(target: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[${target}] Invalid options:\n${fieldErrors}`, 'INVALID_OPTIONS', { cause: zodError });
        this.name = 'MiddlewareOptionsError';
        this.target = target;
    }
}

function describe(value: unknown): string {
    if (typeof value === 'function') {
        return value.name ? `function ${value.name}` : 'anonymous function';
    }
    if (value === null) return 'null';
    if (typeof value === 'object') return value.constructor?.name ?? 'object';
    return typeof value;
}
