export * from './types.js';
export * from './error-codes.js';
export * from './errors.js';
export { detectHosting, isSuspendingHost } from './hosting.js';
export type { HostingInfo } from './hosting.js';
export { SpanHandler, SpanEventBuffer, SpanStatusError, scopeAttributes } from './span-handler.js';
export type {
    CallOutcome,
    DefaultAttributesInput,
    HydrationInput,
    PreTracingResult,
} from './span-handler.js';
export { DedupSpanHandler } from './dedup-span-handler.js';
export type { DedupSpanHandlerOptions } from './dedup-span-handler.js';
export { HttpSpanHandler } from './http-span-handler.js';
export type { HttpSpanHandlerOptions } from './http-span-handler.js';
export { SpanLifecycle } from './span-lifecycle.js';
export type { LifecycleState } from './span-lifecycle.js';
export { TracedAsyncStream, TracedStream } from './traced-stream.js';
export {
    asyncWrapper,
    isAsyncIterable,
    isIterable,
    isIterator,
    isPromiseLike,
    scopeWrapper,
    streamWrapper,
    syncWrapper,
} from './wrappers.js';
export { DEFAULT_HANDLER, INSTRUMENTED, InterceptionRegistry, spanNameOf } from './registry.js';
export type { InterceptionRegistryOptions, ModuleLoader } from './registry.js';
export { startTrace, stopTrace, traceFunction, withTrace } from './custom-spans.js';
export type { CustomEvent, CustomSpanOptions, StopTraceOptions, TraceToken } from './custom-spans.js';
