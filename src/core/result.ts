/**
 * MiddlewareResult — Non-Data Outcome Markers
 *
 * A middleware may return one of these markers instead of actual data.
 * Anything else it returns (including `undefined`) counts as success.
 *
 * - `OK`     — Processing succeeded, nothing to return.
 * - `IGNORE` — This middleware declines; try something else.
 *
 * Markers are unique symbols, so no data value can ever collide with them.
 *
 * @example
 * ```typescript
 * const onlyCommands = asMiddleware(async (call, next) => {
 *     if (!String(call.args[0]).startsWith('!')) return MiddlewareResult.IGNORE;
 *     return next(call);
 * });
 * ```
 *
 * @module
 */

const OK: unique symbol = Symbol('MiddlewareResult.OK');
const IGNORE: unique symbol = Symbol('MiddlewareResult.IGNORE');

export const MiddlewareResult = { OK, IGNORE } as const;

/** Union of the two outcome markers. */
export type MiddlewareResult = typeof OK | typeof IGNORE;

/**
 * Returns `true` when `value` is a successful middleware result,
 * i.e. anything except {@link MiddlewareResult.IGNORE}.
 */
export function isSuccessfulResult(value: unknown): boolean {
    return value !== MiddlewareResult.IGNORE;
}
