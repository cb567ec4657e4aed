export { Tracing, setupTracing } from './tracing.js';
export type { SetupTracingOptions } from './tracing.js';
export * from './errors.js';
export * from './error-codes.js';
