import { MiddlewareChain } from '../collection/MiddlewareChain.js';
import { type Middleware } from '../core/Middleware.js';
import { type MiddlewareContext } from '../core/types.js';
import { type MiddlewareLike, toMiddleware } from './helpers.js';

/**
 * Fluent alternative to nesting {@link middleware} wrappers.
 *
 * Start from the innermost handler and prepend guards: each prepended unit
 * runs before everything added so far. The resulting member order is the
 * same as with nested `middleware()` calls.
 *
 * @example
 * ```typescript
 * const onMessage = ChainBuilder.from<BotContext>(handleMessage)
 *     .prepend(requireGuild)
 *     .prepend(logEvent)
 *     .build();
 * // runs: logEvent → requireGuild → handleMessage
 * ```
 */
export class ChainBuilder<TContext extends MiddlewareContext = MiddlewareContext> {
    private readonly _members: Middleware<TContext>[] = [];

    /** Start a builder whose innermost member is `handler`. */
    public static from<TContext extends MiddlewareContext = MiddlewareContext>(
        handler: MiddlewareLike<TContext>,
    ): ChainBuilder<TContext> {
        return new ChainBuilder<TContext>().prepend(handler);
    }

    /** Place `unit` in front of every member added so far. Functions are converted once, here. */
    public prepend(unit: MiddlewareLike<TContext>): this {
        this._members.push(toMiddleware(unit));
        return this;
    }

    public get size(): number {
        return this._members.length;
    }

    /** Build a new chain. The builder stays usable; later builds are independent chains. */
    public build(): MiddlewareChain<TContext> {
        const chain = new MiddlewareChain<TContext>();
        for (const member of this._members) {
            chain.add(member);
        }
        return chain;
    }
}
