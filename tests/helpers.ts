/**
 * Shared test fixtures: probe middleware and call factories.
 */
import {
    createCall,
    type MiddlewareCall,
    type MiddlewareContext,
    type MiddlewareFn,
    type Next,
} from '../src/index.js';

export interface LogContext extends MiddlewareContext {
    log: string[];
}

export function logContext(): LogContext {
    return { log: [] };
}

/** Middleware that logs `<name>-before` / `<name>-after` around `next`. */
export function probe<TContext extends LogContext>(name: string): MiddlewareFn<TContext> {
    return async (call, next) => {
        call.ctx.log.push(`${name}-before`);
        const result = await next(call);
        call.ctx.log.push(`${name}-after`);
        return result;
    };
}

/** Middleware that returns `value` without calling `next`. */
export function returning(value: unknown): MiddlewareFn {
    return async () => value;
}

/** Terminal continuation that logs `T` and returns `"T"`. */
export const terminal: Next<LogContext> = async (call: MiddlewareCall<LogContext>) => {
    call.ctx.log.push('T');
    return 'T';
};

export function callOf<TContext extends MiddlewareContext>(ctx: TContext): MiddlewareCall<TContext> {
    return createCall(ctx);
}
