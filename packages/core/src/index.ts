/**
 * @callscope/core - Main entry point
 *
 * Method interception, span lifecycle hooks, scope propagation and span export for
 * Node.js services.
 */

// Setup
export * from './telemetry/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Context runtime, scopes and propagation
export * from './context/index.js';

// Interception registry and span lifecycle
export * from './instrumentation/index.js';

// Export pipeline
export * from './export/index.js';

// Object store contract
export * from './storage/index.js';

// Attribute names and SDK identity
export * from './semconv.js';
export * from './version.js';
