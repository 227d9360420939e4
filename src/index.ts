/**
 * @module
 * @description
 * Units, outcome markers, state injection, and construction errors.
 */
// ── Core ─────────────────────────────────────────────────
/** @category Core */
export {
    MiddlewareResult, isSuccessfulResult,
    createCall,
    Middleware,
    MiddlewareFunction, isAsyncFunction,
    MiddlewareState, ContextState,
    getState, setState, stateKeyOf, ensureStates,
    MiddlewareError, NotAsyncFunctionError, NotMiddlewareError, MiddlewareOptionsError,
    MiddlewareStateOptionsSchema, parseOptions,
} from './core/index.js';
/** @category Core */
export type {
    MiddlewareCall, MiddlewareContext, MiddlewareFn, Next,
    PrimitiveStateKey, StateConstructor, StateKey, StateStore,
    ContextStateClass,
    MiddlewareErrorCode,
    MiddlewareStateOptions,
} from './core/index.js';

/**
 * @module
 * @description
 * Collections: grouped middleware with a run policy.
 */
// ── Collections ──────────────────────────────────────────
/** @category Collections */
export {
    MiddlewareCollection,
    MiddlewareChain,
    OneOfAll,
    AllOfAll,
} from './collection/index.js';

/**
 * @module
 * @description
 * Helpers for converting functions and assembling collections.
 */
// ── Builders ─────────────────────────────────────────────
/** @category Builders */
export {
    asMiddleware, toMiddleware,
    collectionOf, chainOf,
    middleware,
    ChainBuilder,
} from './builder/index.js';
/** @category Builders */
export type { MiddlewareLike } from './builder/index.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver, SpanStatusCode } from './observability/index.js';
/** @category Observability */
export type {
    CollectionKind, DebugEvent, DebugObserverFn,
    RunEvent, ResultEvent, ErrorEvent,
    PipelineAttributeValue, PipelineSpan, PipelineTracer,
} from './observability/index.js';
