import { type Middleware } from '../core/Middleware.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type Next,
} from '../core/types.js';
import { MiddlewareCollection } from './MiddlewareCollection.js';

/**
 * Chains middleware so each one wraps the one added before it.
 *
 * The member list is stored reversed relative to execution: the last
 * added member is entered first, and the first added member sits next to
 * the terminal `next`. Adding a handler first and then its guards makes
 * the most recently added guard the outermost one.
 *
 * ```
 * add(handler); add(auth); add(log);
 * run → log → auth → handler → next
 * ```
 *
 * The first member's source function becomes the chain's `fn`, so a chain
 * grown from a function keeps that function's identity.
 */
export class MiddlewareChain<TContext extends MiddlewareContext = MiddlewareContext>
    extends MiddlewareCollection<TContext> {
    protected readonly kind = 'chain' as const;

    public override add<TMiddleware extends Middleware<TContext>>(middleware: TMiddleware): TMiddleware {
        super.add(middleware);
        if (this.collection.length === 1) {
            this.fn = middleware.fn;
        }
        return middleware;
    }

    /**
     * Walks the members from the end. Each member receives a continuation
     * that advances to the previous index; index -1 is the terminal `next`.
     * A continuation may be called more than once.
     */
    protected dispatch(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        const members = this.collection;

        const step = (index: number, current: MiddlewareCall<TContext>): Promise<unknown> => {
            const member = members[index];
            if (!member) return next(current);
            return member.run(current, forwarded => step(index - 1, forwarded));
        };

        return step(members.length - 1, call);
    }
}
