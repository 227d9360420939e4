/**
 * MiddlewareState — State Injection for Downstream Middleware
 *
 * Stores a state value in the context, keyed by the state's own identity,
 * and optionally forwards it as a named argument. An alternative to
 * closures or class fields when several middleware share a dependency.
 *
 * A {@link ContextState} subclass passed as the state is instantiated on
 * every run, so each invocation gets its own instance. Any other value is
 * shared by all invocations as-is.
 *
 * @example
 * ```typescript
 * class Session extends ContextState {
 *     readonly seen = new Set<string>();
 * }
 *
 * const pipeline = chainOf<BotContext>([
 *     handler,
 *     new MiddlewareState(db, { key: 'db' }),   // shared, forwarded as kwargs.db
 *     new MiddlewareState(Session),              // fresh per run
 * ]);
 *
 * // Inside a downstream middleware:
 * const session = getState(call.ctx, Session);  // Session | undefined
 * ```
 *
 * @module
 */
import { Middleware } from './Middleware.js';
import {
    type MiddlewareStateOptions,
    MiddlewareStateOptionsSchema,
    parseOptions,
} from './options.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type Next,
    type PrimitiveStateKey,
    type StateConstructor,
    type StateKey,
    type StateStore,
} from './types.js';

// ── Per-run marker ───────────────────────────────────────

/**
 * State that is instantiated on every middleware run.
 * Subclass it and pass the subclass itself (not an instance) as the state.
 */
export class ContextState {}

/** A `ContextState` subclass that can be constructed without arguments. */
export type ContextStateClass<T extends ContextState = ContextState> = new () => T;

function isContextStateClass(value: unknown): value is ContextStateClass {
    return typeof value === 'function'
        && (value === ContextState || value.prototype instanceof ContextState);
}

// ── Store helpers ────────────────────────────────────────

/**
 * Return the identity `value` is stored under: its constructor for objects,
 * its type name for primitives.
 */
export function stateKeyOf(value: unknown): StateKey {
    switch (typeof value) {
        case 'object':
            break;
        case 'string':
            return 'string';
        case 'number':
            return 'number';
        case 'bigint':
            return 'bigint';
        case 'boolean':
            return 'boolean';
        case 'symbol':
            return 'symbol';
        case 'undefined':
            return 'undefined';
        case 'function':
            return 'function';
    }
    if (value === null) return 'null';
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== null && typeof proto === 'object' && Object.hasOwn(proto, 'constructor')) {
        const ctor: unknown = Reflect.get(proto, 'constructor');
        if (typeof ctor === 'function') return ctor;
    }
    return Object;
}

/** Return the context's state store, creating it if missing. Never replaces an existing store. */
export function ensureStates(ctx: MiddlewareContext): StateStore {
    if (!ctx.states) {
        ctx.states = new Map();
    }
    return ctx.states;
}

/** Return a state from the context, or `undefined` if it was never set. */
export function getState<T>(ctx: MiddlewareContext, type: StateConstructor<T>): T | undefined;
export function getState(ctx: MiddlewareContext, type: PrimitiveStateKey): unknown;
export function getState(ctx: MiddlewareContext, type: StateKey): unknown {
    return ensureStates(ctx).get(type);
}

/** Store a state in the context under {@link stateKeyOf}(state). Last write wins. */
export function setState(ctx: MiddlewareContext, state: unknown): void {
    ensureStates(ctx).set(stateKeyOf(state), state);
}

// ── Middleware ───────────────────────────────────────────

export class MiddlewareState<TState = unknown, TContext extends MiddlewareContext = MiddlewareContext>
    extends Middleware<TContext> {
    /** The state, or the `ContextState` subclass to instantiate per run. */
    public readonly state: TState;
    /** Named argument the state is forwarded under, if any. */
    public readonly key: string | undefined;

    public constructor(state: TState, options: MiddlewareStateOptions = {}) {
        super();
        const parsed = parseOptions('MiddlewareState', MiddlewareStateOptionsSchema, options);
        this.state = state;
        this.key = parsed.key;
    }

    public run(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        const state: unknown = isContextStateClass(this.state) ? new this.state() : this.state;

        const kwargs = this.key ? { ...call.kwargs, [this.key]: state } : call.kwargs;
        setState(call.ctx, state);

        return next({ ...call, kwargs });
    }

    public static getState = getState;
    public static setState = setState;
}
