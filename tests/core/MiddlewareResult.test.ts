import { describe, it, expect } from 'vitest';
import { Middleware, MiddlewareResult, isSuccessfulResult } from '../../src/index.js';

describe('MiddlewareResult', () => {
    it('markers are distinct symbols', () => {
        expect(typeof MiddlewareResult.OK).toBe('symbol');
        expect(typeof MiddlewareResult.IGNORE).toBe('symbol');
        expect(MiddlewareResult.OK).not.toBe(MiddlewareResult.IGNORE);
    });

    describe('isSuccessfulResult', () => {
        it('is false only for IGNORE', () => {
            expect(isSuccessfulResult(MiddlewareResult.IGNORE)).toBe(false);
        });

        it.each([
            ['OK', MiddlewareResult.OK],
            ['undefined', undefined],
            ['null', null],
            ['false', false],
            ['zero', 0],
            ['empty string', ''],
            ['data', { id: 1 }],
            ['empty array', []],
        ])('treats %s as successful', (_label, value) => {
            expect(isSuccessfulResult(value)).toBe(true);
        });

        it('does not match a look-alike symbol', () => {
            expect(isSuccessfulResult(Symbol('MiddlewareResult.IGNORE'))).toBe(true);
        });

        it('is exposed as a static on Middleware', () => {
            expect(Middleware.isSuccessfulResult(MiddlewareResult.IGNORE)).toBe(false);
            expect(Middleware.isSuccessfulResult('x')).toBe(true);
        });
    });
});
