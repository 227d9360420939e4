/**
 * Construction Helpers
 *
 * Normalize plain `async` functions into middleware and assemble them
 * into collections.
 *
 * @example
 * ```typescript
 * const onMessage = chainOf<BotContext>([handleMessage, requireGuild, logEvent]);
 * // Runs: logEvent → requireGuild → handleMessage → terminal
 *
 * const router = collectionOf(OneOfAll, [helpCommand, pingCommand, fallback]);
 * ```
 *
 * @module
 */
import { MiddlewareChain } from '../collection/MiddlewareChain.js';
import { type MiddlewareCollection } from '../collection/MiddlewareCollection.js';
import { Middleware } from '../core/Middleware.js';
import { MiddlewareFunction } from '../core/MiddlewareFunction.js';
import { type MiddlewareContext, type MiddlewareFn } from '../core/types.js';

/** A middleware, or a plain `async` function to convert into one. */
export type MiddlewareLike<TContext extends MiddlewareContext = MiddlewareContext> =
    | Middleware<TContext>
    | MiddlewareFn<TContext>;

/**
 * Convert a function into a middleware.
 *
 * Always wraps, even when handed something already wrapped: calling it
 * twice on one function yields two distinct middleware. Prefer
 * {@link chainOf} or {@link middleware}, which convert only when needed.
 */
export function asMiddleware<TContext extends MiddlewareContext = MiddlewareContext>(
    fn: MiddlewareFn<TContext>,
): MiddlewareFunction<TContext> {
    return new MiddlewareFunction(fn);
}

/** Return `item` if it is a middleware, else convert it with {@link asMiddleware}. */
export function toMiddleware<TContext extends MiddlewareContext>(
    item: MiddlewareLike<TContext>,
): Middleware<TContext> {
    return item instanceof Middleware ? item : asMiddleware(item);
}

/**
 * Create a collection of the given kind and add `items` to it in order,
 * converting plain functions on the way.
 */
export function collectionOf<
    TContext extends MiddlewareContext,
    TCollection extends MiddlewareCollection<TContext>,
>(
    Kind: new () => TCollection,
    items: Iterable<MiddlewareLike<TContext>>,
): TCollection {
    const collection = new Kind();
    for (const item of items) {
        collection.add(toMiddleware(item));
    }
    return collection;
}

/** Create a {@link MiddlewareChain} of `items`. The last item runs first. */
export function chainOf<TContext extends MiddlewareContext = MiddlewareContext>(
    items: Iterable<MiddlewareLike<TContext>>,
): MiddlewareChain<TContext> {
    return collectionOf(MiddlewareChain<TContext>, items);
}

/**
 * Wrap a target in `outer`.
 *
 * A target that is already a {@link MiddlewareChain} gets `outer` appended
 * and is returned as the same instance; anything else becomes a new chain
 * of `[target, outer]`. Repeated wrapping therefore grows one flat chain,
 * and the last wrapper applied is entered first.
 *
 * @example
 * ```typescript
 * const onMessage = middleware(logEvent)(middleware(requireGuild)(handleMessage));
 * // members: [handleMessage, requireGuild, logEvent]
 * // runs:    logEvent → requireGuild → handleMessage
 * ```
 */
export function middleware<TContext extends MiddlewareContext = MiddlewareContext>(
    outer: MiddlewareLike<TContext>,
): (inner: MiddlewareLike<TContext>) => MiddlewareChain<TContext> {
    const outerMiddleware = toMiddleware(outer);

    return (inner: MiddlewareLike<TContext>): MiddlewareChain<TContext> => {
        // Already a chain: grow it in place
        if (inner instanceof MiddlewareChain) {
            inner.add(outerMiddleware);
            return inner;
        }
        return chainOf<TContext>([inner, outerMiddleware]);
    };
}
