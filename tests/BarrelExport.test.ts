import { describe, it, expect } from 'vitest';

// ============================================================================
// Barrel Export Verification
// Ensures all public API exports are accessible from the package entry point
// ============================================================================

describe('Barrel Export (src/index.ts)', () => {
    it('should export the core units and markers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.MiddlewareResult.OK).toBeTypeOf('symbol');
        expect(mod.MiddlewareResult.IGNORE).toBeTypeOf('symbol');
        expect(mod.isSuccessfulResult).toBeTypeOf('function');
        expect(mod.createCall).toBeTypeOf('function');
        expect(mod.Middleware).toBeDefined();
        expect(mod.MiddlewareFunction).toBeDefined();
        expect(mod.MiddlewareState).toBeDefined();
        expect(mod.ContextState).toBeDefined();
        expect(mod.getState).toBeTypeOf('function');
        expect(mod.setState).toBeTypeOf('function');
    });

    it('should export all collection kinds', async () => {
        const mod = await import('../src/index.js');

        expect(mod.MiddlewareCollection).toBeDefined();
        expect(mod.MiddlewareChain).toBeDefined();
        expect(mod.OneOfAll).toBeDefined();
        expect(mod.AllOfAll).toBeDefined();
    });

    it('should export construction helpers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.asMiddleware).toBeTypeOf('function');
        expect(mod.collectionOf).toBeTypeOf('function');
        expect(mod.chainOf).toBeTypeOf('function');
        expect(mod.middleware).toBeTypeOf('function');
        expect(mod.ChainBuilder).toBeDefined();
    });

    it('should export errors and observability', async () => {
        const mod = await import('../src/index.js');

        expect(mod.MiddlewareError).toBeDefined();
        expect(mod.NotAsyncFunctionError).toBeDefined();
        expect(mod.NotMiddlewareError).toBeDefined();
        expect(mod.MiddlewareOptionsError).toBeDefined();
        expect(mod.createDebugObserver).toBeTypeOf('function');
        expect(mod.SpanStatusCode).toEqual({ UNSET: 0, OK: 1, ERROR: 2 });
    });
});
