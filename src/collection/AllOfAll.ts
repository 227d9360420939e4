import {
    type MiddlewareCall,
    type MiddlewareContext,
    type Next,
} from '../core/types.js';
import { MiddlewareCollection } from './MiddlewareCollection.js';

/**
 * Group with an "ignore success" policy.
 *
 * Runs every member in order, one after another, each with the same call
 * and the same `next`, and returns a frozen array of all their results,
 * `MiddlewareResult.IGNORE` included. The group's own result is therefore
 * always successful.
 */
export class AllOfAll<TContext extends MiddlewareContext = MiddlewareContext>
    extends MiddlewareCollection<TContext> {
    protected readonly kind = 'allOf' as const;

    protected async dispatch(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<readonly unknown[]> {
        const results: unknown[] = [];
        for (const member of this.collection) {
            results.push(await member.run(call, next));
        }
        return Object.freeze(results);
    }
}
