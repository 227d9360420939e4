import { NotAsyncFunctionError } from './errors.js';
import { Middleware } from './Middleware.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type MiddlewareFn,
    type Next,
} from './types.js';

/**
 * Check if a value is a native async function.
 * Reads the engine-set Symbol.toStringTag, which survives minification
 * (unlike constructor.name).
 * @internal
 */
export function isAsyncFunction(fn: unknown): boolean {
    return typeof fn === 'function'
        && Object.prototype.toString.call(fn) === '[object AsyncFunction]';
}

/**
 * Converts a plain `async` function into a middleware.
 *
 * Throws {@link NotAsyncFunctionError} for anything that is not declared
 * `async`, including ordinary functions that happen to return a promise.
 */
export class MiddlewareFunction<TContext extends MiddlewareContext = MiddlewareContext>
    extends Middleware<TContext> {
    declare readonly fn: MiddlewareFn<TContext>;

    public constructor(fn: MiddlewareFn<TContext>) {
        super();
        if (!isAsyncFunction(fn)) {
            throw new NotAsyncFunctionError(fn);
        }
        this.fn = fn;
    }

    public run(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        return this.fn(call, next);
    }
}
