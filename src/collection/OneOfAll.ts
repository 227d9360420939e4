import { MiddlewareResult, isSuccessfulResult } from '../core/result.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type Next,
} from '../core/types.js';
import { MiddlewareCollection } from './MiddlewareCollection.js';

/**
 * Group with a "first success" policy.
 *
 * Runs members in order, each with the same call and the same `next`,
 * and returns the first successful result. Returns `MiddlewareResult.IGNORE`
 * when every member declines or the group is empty.
 */
export class OneOfAll<TContext extends MiddlewareContext = MiddlewareContext>
    extends MiddlewareCollection<TContext> {
    protected readonly kind = 'oneOf' as const;

    protected async dispatch(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        for (const member of this.collection) {
            const result = await member.run(call, next);
            if (isSuccessfulResult(result)) {
                return result;
            }
        }
        return MiddlewareResult.IGNORE;
    }
}
