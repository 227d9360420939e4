/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('eventchain')` can be passed
 * straight to `collection.tracing()` without an adapter and without a
 * runtime `@opentelemetry/*` dependency.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const pipeline = chainOf([handler, auth, rateLimit])
 *     .tracing(trace.getTracer('eventchain'));
 * ```
 *
 * @module
 */

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0) — Default.
 * - `OK` (1) — The collection returned (successful or not).
 * - `ERROR` (2) — A member or continuation threw.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/**
 * Attribute value type — matches OpenTelemetry's `SpanAttributeValue`.
 * Arrays are mutable as in OTel; `ReadonlyArray` or `unknown` here would
 * break assignability of an OTel `Tracer` in strict mode.
 */
export type PipelineAttributeValue =
    | string
    | number
    | boolean
    | Array<string>
    | Array<number>
    | Array<boolean>;

/** Structural subtype of OTel's `Span`. */
export interface PipelineSpan {
    setAttribute(key: string, value: PipelineAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Optional: not every tracer supports events. */
    addEvent?(name: string, attributes?: Record<string, PipelineAttributeValue>): void;
    /** Must be called exactly once. */
    end(): void;
    recordException(exception: Error | string): void;
}

/**
 * Structural subtype of OTel's `Tracer`. Only the first two parameters of
 * `startSpan(name, options?, context?)` are used, so spans are not parented
 * through OTel's context API.
 */
export interface PipelineTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, PipelineAttributeValue>;
    }): PipelineSpan;
}
