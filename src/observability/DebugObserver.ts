/**
 * DebugObserver — Opt-In Pipeline Logging
 *
 * Structured, typed debug events emitted by collections as they run.
 * Disabled by default: a collection without an observer or tracer calls
 * its policy directly, with no extra work in the hot path.
 *
 * @example
 * ```typescript
 * // Default: pretty console.debug output
 * const pipeline = chainOf([handler, auth]).debug(createDebugObserver());
 *
 * // Custom handler (e.g. forward to a structured logger)
 * pipeline.debug(createDebugObserver((event) => logger.debug(event)));
 * ```
 *
 * @module
 */

/** Run policy of the collection that emitted an event. */
export type CollectionKind = 'chain' | 'oneOf' | 'allOf' | 'custom';

/** Emitted when a collection starts running. */
export interface RunEvent {
    readonly type: 'run';
    /** Collection label (source function name or class name) */
    readonly collection: string;
    readonly kind: CollectionKind;
    /** Number of members */
    readonly size: number;
    readonly timestamp: number;
}

/** Emitted when a collection returns. */
export interface ResultEvent {
    readonly type: 'result';
    readonly collection: string;
    readonly kind: CollectionKind;
    /** `false` only when the collection returned `MiddlewareResult.IGNORE` */
    readonly successful: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a member or continuation throws. The error is re-thrown unchanged. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly collection: string;
    readonly kind: CollectionKind;
    readonly error: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types. Switch on `event.type` for exhaustive handling.
 */
export type DebugEvent = RunEvent | ResultEvent | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

/**
 * Create a debug observer.
 *
 * If a custom handler is provided, it is returned as-is. Otherwise the
 * default handler writes compact lines via `console.debug`:
 *
 * ```
 * [eventchain] run      onMessage (chain, 3 members)
 * [eventchain] result   onMessage ✓ 1.2ms
 * [eventchain] ERROR    onMessage boom 0.4ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[eventchain]';

        switch (event.type) {
            case 'run':
                console.debug(`${prefix} run      ${event.collection} (${event.kind}, ${event.size} members)`);
                break;

            case 'result': {
                const icon = event.successful ? '✓' : '∅';
                console.debug(`${prefix} result   ${event.collection} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} ERROR    ${event.collection} ${event.error} ${event.durationMs.toFixed(1)}ms`);
                break;
        }
    };
}
