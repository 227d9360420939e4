/** Collection Bounded Context — Barrel Export */
export { MiddlewareCollection } from './MiddlewareCollection.js';
export { MiddlewareChain } from './MiddlewareChain.js';
export { OneOfAll } from './OneOfAll.js';
export { AllOfAll } from './AllOfAll.js';
