/**
 * Middleware — Event Processing Unit
 *
 * Base class of every pipeline unit: function adapters, state injectors,
 * and collections (which are middleware themselves). Subclass it to write
 * class-based middleware.
 *
 * A middleware may:
 * - return data, or `MiddlewareResult.OK`, to signal success;
 * - return `MiddlewareResult.IGNORE` to decline;
 * - delegate with `next(call)` and return its result;
 * - delegate, inspect the result, and return something else.
 *
 * @example
 * ```typescript
 * class RequireGuild extends Middleware<BotContext> {
 *     async run(call: MiddlewareCall<BotContext>, next: Next<BotContext>) {
 *         if (!call.ctx.guildId) return MiddlewareResult.IGNORE;
 *         return next(call);
 *     }
 * }
 * ```
 *
 * @module
 */
import { isSuccessfulResult } from './result.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type MiddlewareFn,
    type Next,
} from './types.js';

export abstract class Middleware<TContext extends MiddlewareContext = MiddlewareContext> {
    /**
     * Source function, when this middleware is a converted function or a
     * chain whose first member is one. Undefined otherwise.
     */
    public fn: MiddlewareFn<TContext> | undefined = undefined;

    /**
     * Middleware's main logic.
     *
     * The context may be replaced for the remainder of this invocation by
     * forwarding `{ ...call, ctx: replacement }` to `next`.
     */
    public abstract run(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown>;

    /** Invoke the middleware. Same as {@link run}. */
    public invoke(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        return this.run(call, next);
    }

    /** Label for logs and spans: the source function's name, else the class name. */
    public get name(): string {
        return this.fn?.name || this.constructor.name;
    }

    public static isSuccessfulResult(value: unknown): boolean {
        return isSuccessfulResult(value);
    }
}
