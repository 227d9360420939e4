import { describe, it, expect, vi } from 'vitest';
import {
    asMiddleware,
    createCall,
    Middleware,
    MiddlewareChain,
    MiddlewareCollection,
    MiddlewareError,
    type MiddlewareCall,
    type Next,
    NotMiddlewareError,
    OneOfAll,
} from '../../src/index.js';
import { returning } from '../helpers.js';

class Upper extends Middleware {
    async run(call: MiddlewareCall, next: Next): Promise<unknown> {
        return String(await next(call)).toUpperCase();
    }
}

/** User-defined policy: run members from last to first, return the last result. */
class Reversed extends MiddlewareCollection {
    protected readonly kind = 'custom' as const;

    protected async dispatch(call: MiddlewareCall, next: Next): Promise<unknown> {
        let result: unknown;
        for (const member of [...this.collection].reverse()) {
            result = await member.run(call, next);
        }
        return result;
    }
}

describe('MiddlewareCollection', () => {
    describe('add', () => {
        it('returns the given middleware', () => {
            const group = new OneOfAll();
            const mw = asMiddleware(returning('X'));
            expect(group.add(mw)).toBe(mw);
            expect(group.collection).toEqual([mw]);
        });

        it('keeps insertion order and allows duplicates', () => {
            const group = new OneOfAll();
            const a = asMiddleware(returning('a'));
            const b = asMiddleware(returning('b'));
            group.add(a);
            group.add(b);
            group.add(a);
            expect(group.members()).toEqual([a, b, a]);
            expect(group.size).toBe(3);
        });

        it('members() is a snapshot', () => {
            const group = new OneOfAll();
            const snapshot = group.members();
            group.add(asMiddleware(returning('a')));
            expect(snapshot).toHaveLength(0);
        });

        it.each([
            ['a plain async function', async () => 'x'],
            ['a plain object', { run: async () => 'x' }],
            ['null', null],
            ['a string', 'middleware'],
        ])('rejects %s', (_label, value) => {
            const group = new MiddlewareChain();
            expect(() => group.add(value as unknown as Middleware)).toThrow(NotMiddlewareError);
            expect(group.size).toBe(0);
        });

        it('NotMiddlewareError carries code NOT_MIDDLEWARE', () => {
            try {
                new OneOfAll().add({} as unknown as Middleware);
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(MiddlewareError);
                expect((e as MiddlewareError).code).toBe('NOT_MIDDLEWARE');
                expect((e as Error).message).toBe('Not a middleware: Object');
            }
        });
    });

    describe('user-defined middleware', () => {
        it('class-based middleware composes with function middleware', async () => {
            const chain = new MiddlewareChain();
            chain.add(asMiddleware(async () => 'handled'));
            chain.add(new Upper());

            expect(await chain.run(createCall({}), vi.fn())).toBe('HANDLED');
        });

        it('class-based middleware uses its class name as label', () => {
            expect(new Upper().name).toBe('Upper');
            expect(new Upper().fn).toBeUndefined();
        });

        it('a custom collection policy can be plugged in', async () => {
            const group = new Reversed();
            group.add(asMiddleware(returning('first-added')));
            group.add(asMiddleware(returning('last-added')));

            expect(await group.run(createCall({}), vi.fn())).toBe('first-added');
        });
    });
});
