/** Observability Bounded Context — Barrel Export */
export { createDebugObserver } from './DebugObserver.js';
export type {
    CollectionKind,
    DebugEvent,
    DebugObserverFn,
    ErrorEvent,
    ResultEvent,
    RunEvent,
} from './DebugObserver.js';
export { SpanStatusCode } from './Tracing.js';
export type {
    PipelineAttributeValue,
    PipelineSpan,
    PipelineTracer,
} from './Tracing.js';
