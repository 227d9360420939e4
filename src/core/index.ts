/** Core Bounded Context — Barrel Export */
export { MiddlewareResult, isSuccessfulResult } from './result.js';
export { createCall } from './types.js';
export type {
    MiddlewareCall,
    MiddlewareContext,
    MiddlewareFn,
    Next,
    PrimitiveStateKey,
    StateConstructor,
    StateKey,
    StateStore,
} from './types.js';
export { Middleware } from './Middleware.js';
export { MiddlewareFunction, isAsyncFunction } from './MiddlewareFunction.js';
export {
    MiddlewareState,
    ContextState,
    getState,
    setState,
    stateKeyOf,
    ensureStates,
} from './MiddlewareState.js';
export type { ContextStateClass } from './MiddlewareState.js';
export {
    MiddlewareError,
    NotAsyncFunctionError,
    NotMiddlewareError,
    MiddlewareOptionsError,
} from './errors.js';
export type { MiddlewareErrorCode } from './errors.js';
export { MiddlewareStateOptionsSchema, parseOptions } from './options.js';
export type { MiddlewareStateOptions } from './options.js';
