/**
 * Core Types — Call Shape, Context, and Continuations
 *
 * Every middleware receives one {@link MiddlewareCall} plus a continuation.
 * The call keeps positional arguments, the context, and named arguments in
 * separate fields, so the context can never be mistaken for a positional
 * argument by a downstream middleware.
 *
 * @module
 */

// ── Context ──────────────────────────────────────────────

/** A state value's constructor. Any class with any constructor signature matches. */
export type StateConstructor<T = unknown> = abstract new (...args: never[]) => T;

/** Type names used as keys for primitive state values. */
export type PrimitiveStateKey =
    | 'string'
    | 'number'
    | 'bigint'
    | 'boolean'
    | 'symbol'
    | 'undefined'
    | 'null'
    | 'function';

/**
 * Identity a state value is stored under: its constructor for objects,
 * or its type name for primitives.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type StateKey = Function | PrimitiveStateKey;

/** Per-invocation side table of states, keyed by state identity. */
export type StateStore = Map<StateKey, unknown>;

/**
 * Minimal context shape. The event source owns the context and may put
 * any fields on it; the pipeline only needs room for the lazily-created
 * `states` store.
 */
export interface MiddlewareContext {
    states?: StateStore | undefined;
}

// ── Call ─────────────────────────────────────────────────

/**
 * One step's input. Treat it as immutable: forward a changed call with
 * `next({ ...call, ctx: replacement })`.
 */
export interface MiddlewareCall<TContext extends MiddlewareContext = MiddlewareContext> {
    readonly args: readonly unknown[];
    readonly ctx: TContext;
    readonly kwargs: Readonly<Record<string, unknown>>;
}

/**
 * The rest of the pipeline. Not necessarily a middleware: the terminal
 * continuation is whatever the event source passes in.
 */
export type Next<TContext extends MiddlewareContext = MiddlewareContext> = (
    call: MiddlewareCall<TContext>,
) => Promise<unknown>;

/**
 * Plain middleware function signature.
 *
 * @example
 * ```typescript
 * const logger: MiddlewareFn<AppContext> = async (call, next) => {
 *     const start = Date.now();
 *     const result = await next(call);
 *     console.log(`handled in ${Date.now() - start}ms`);
 *     return result;
 * };
 * ```
 */
export type MiddlewareFn<TContext extends MiddlewareContext = MiddlewareContext> = (
    call: MiddlewareCall<TContext>,
    next: Next<TContext>,
) => Promise<unknown>;

// ── Helpers ──────────────────────────────────────────────

/**
 * Build a call for `ctx` with optional positional and named arguments.
 *
 * @example
 * ```typescript
 * await chain.invoke(createCall(ctx, { args: [message] }), terminal);
 * ```
 */
export function createCall<TContext extends MiddlewareContext>(
    ctx: TContext,
    options: { args?: readonly unknown[]; kwargs?: Readonly<Record<string, unknown>> } = {},
): MiddlewareCall<TContext> {
    return {
        args: options.args ?? [],
        ctx,
        kwargs: options.kwargs ?? {},
    };
}
