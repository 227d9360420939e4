/**
 * MiddlewareCollection — Grouped Middleware
 *
 * A group of middleware that is a middleware itself, so collections nest.
 * Each subclass decides how its members run (all of them, until the first
 * success, as a nested chain, ...) by implementing {@link dispatch}.
 * Member order is significant to every policy.
 *
 * `run` wraps `dispatch` with the optional debug observer and tracer.
 * With neither attached it calls `dispatch` directly.
 *
 * @module
 */
import { NotMiddlewareError } from '../core/errors.js';
import { Middleware } from '../core/Middleware.js';
import { isSuccessfulResult } from '../core/result.js';
import {
    type MiddlewareCall,
    type MiddlewareContext,
    type Next,
} from '../core/types.js';
import { type CollectionKind, type DebugObserverFn } from '../observability/DebugObserver.js';
import { type PipelineTracer, SpanStatusCode } from '../observability/Tracing.js';

export abstract class MiddlewareCollection<TContext extends MiddlewareContext = MiddlewareContext>
    extends Middleware<TContext> {
    /** Members in insertion order. */
    public readonly collection: Middleware<TContext>[] = [];

    /** Policy tag reported in debug events and span names. */
    protected abstract readonly kind: CollectionKind;

    private _debug: DebugObserverFn | undefined;
    private _tracer: PipelineTracer | undefined;

    /**
     * Add a middleware. Returns the given middleware, so the call can wrap
     * a definition inline.
     *
     * @throws {@link NotMiddlewareError} if `middleware` is not a `Middleware` instance
     */
    public add<TMiddleware extends Middleware<TContext>>(middleware: TMiddleware): TMiddleware {
        if (!(middleware instanceof Middleware)) {
            throw new NotMiddlewareError(middleware);
        }
        this.collection.push(middleware);
        return middleware;
    }

    public get size(): number {
        return this.collection.length;
    }

    /** Read-only snapshot of the members. */
    public members(): readonly Middleware<TContext>[] {
        return [...this.collection];
    }

    // ── Observability ────────────────────────────────────

    /** Attach a debug observer. Pass `createDebugObserver()` for console output. */
    public debug(observer: DebugObserverFn): this {
        this._debug = observer;
        return this;
    }

    /** Attach an OpenTelemetry-compatible tracer. One span per run. */
    public tracing(tracer: PipelineTracer): this {
        this._tracer = tracer;
        return this;
    }

    // ── Execution ────────────────────────────────────────

    /** Run policy. */
    protected abstract dispatch(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown>;

    public run(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        if (!this._debug && !this._tracer) {
            return this.dispatch(call, next);
        }
        return this.observedDispatch(call, next);
    }

    private async observedDispatch(call: MiddlewareCall<TContext>, next: Next<TContext>): Promise<unknown> {
        const debug = this._debug;
        const collection = this.name;
        const kind = this.kind;
        const start = Date.now();

        const span = this._tracer?.startSpan(`eventchain.${kind}`, {
            attributes: {
                'eventchain.collection': collection,
                'eventchain.kind': kind,
                'eventchain.size': this.collection.length,
            },
        });

        debug?.({ type: 'run', collection, kind, size: this.collection.length, timestamp: start });

        try {
            const result = await this.dispatch(call, next);
            const durationMs = Date.now() - start;
            const successful = isSuccessfulResult(result);

            span?.setAttribute('eventchain.successful', successful);
            span?.setAttribute('eventchain.durationMs', durationMs);
            span?.setStatus({ code: SpanStatusCode.OK });

            debug?.({ type: 'result', collection, kind, successful, durationMs, timestamp: Date.now() });

            return result;
        } catch (err) {
            const durationMs = Date.now() - start;
            const message = err instanceof Error ? err.message : String(err);

            span?.setAttribute('eventchain.durationMs', durationMs);
            span?.setStatus({ code: SpanStatusCode.ERROR, message });
            span?.recordException(err instanceof Error ? err : new Error(message));

            debug?.({ type: 'error', collection, kind, error: message, durationMs, timestamp: Date.now() });

            throw err;
        } finally {
            span?.end();
        }
    }
}
