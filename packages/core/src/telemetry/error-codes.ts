/**
 * Tracing setup and lifecycle error codes
 */
export enum TelemetryErrorCode {
    // Initialization errors
    INITIALIZATION_FAILED = 'telemetry_initialization_failed',
    NOT_INITIALIZED = 'telemetry_not_initialized',
    OBJECT_STORE_REQUIRED = 'telemetry_object_store_required',

    // Shutdown errors
    SHUTDOWN_FAILED = 'telemetry_shutdown_failed',
}
