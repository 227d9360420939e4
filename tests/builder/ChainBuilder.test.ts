import { describe, it, expect } from 'vitest';
import { ChainBuilder, middleware, MiddlewareChain } from '../../src/index.js';
import { callOf, type LogContext, logContext, probe, terminal } from '../helpers.js';

describe('ChainBuilder', () => {
    it('prepended units run before everything added so far', async () => {
        const chain = ChainBuilder.from<LogContext>(probe('handler'))
            .prepend(probe('auth'))
            .prepend(probe('log'))
            .build();
        const ctx = logContext();

        await chain.run(callOf(ctx), terminal);

        expect(ctx.log).toEqual([
            'log-before', 'auth-before', 'handler-before',
            'T',
            'handler-after', 'auth-after', 'log-after',
        ]);
    });

    it('produces the same member order as nested middleware() wrappers', () => {
        const handler = probe<LogContext>('handler');
        const auth = probe<LogContext>('auth');
        const log = probe<LogContext>('log');

        const built = ChainBuilder.from<LogContext>(handler).prepend(auth).prepend(log).build();
        const wrapped = middleware<LogContext>(log)(middleware<LogContext>(auth)(handler));

        expect(built.collection.map(m => m.fn)).toEqual([handler, auth, log]);
        expect(wrapped.collection.map(m => m.fn)).toEqual([handler, auth, log]);
        expect(built.fn).toBe(handler);
    });

    it('build returns a new chain each time', () => {
        const builder = ChainBuilder.from<LogContext>(probe('handler'));
        const first = builder.build();
        builder.prepend(probe('late'));
        const second = builder.build();

        expect(first).toBeInstanceOf(MiddlewareChain);
        expect(first).not.toBe(second);
        expect(first.size).toBe(1);
        expect(second.size).toBe(2);
        expect(second.collection[0]).toBe(first.collection[0]);
    });

    it('an empty builder builds an empty chain', async () => {
        const builder = new ChainBuilder<LogContext>();
        expect(builder.size).toBe(0);
        expect(await builder.build().run(callOf(logContext()), terminal)).toBe('T');
    });
});
