/**
 * Export-specific error codes
 * Raised while serializing and delivering finished spans
 */
export enum ExportErrorCode {
    // Sink lifecycle
    SINK_SHUTDOWN = 'export_sink_shutdown',

    // Delivery
    HTTP_STATUS = 'export_http_status',
    TIMEOUT = 'export_timeout',
    NETWORK = 'export_network',
    RETRIES_EXHAUSTED = 'export_retries_exhausted',
    DELIVERY_FAILED = 'export_delivery_failed',

    // Encoding
    SERIALIZATION_FAILED = 'export_serialization_failed',

    // Flushing
    FLUSH_TIMEOUT = 'export_flush_timeout',
}
