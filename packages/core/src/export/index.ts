export * from './types.js';
export * from './errors.js';
export * from './error-codes.js';
export * from './serializer.js';
export * from './retry.js';
export * from './timeout.js';
export * from './batch-processor.js';
export * from './composite-exporter.js';
export * from './deferred-delivery.js';
export * from './sinks/base-sink.js';
export * from './sinks/buffered-trace-sink.js';
export * from './sinks/console-sink.js';
export * from './sinks/file-sink.js';
export * from './sinks/http-ingest-sink.js';
export * from './sinks/memory-sink.js';
export * from './sinks/object-storage-sink.js';
export * from './sinks/otlp-sink.js';
