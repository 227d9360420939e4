/** Builder Bounded Context — Barrel Export */
export {
    asMiddleware,
    toMiddleware,
    collectionOf,
    chainOf,
    middleware,
} from './helpers.js';
export type { MiddlewareLike } from './helpers.js';
export { ChainBuilder } from './ChainBuilder.js';
