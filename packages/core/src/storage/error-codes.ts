/**
 * Storage-specific error codes
 * Raised by object store backends used for span archives
 */
export enum StorageErrorCode {
    // Connection
    CONNECTION_FAILED = 'storage_connection_failed',
    NOT_CONNECTED = 'storage_not_connected',

    // Operations
    READ_FAILED = 'storage_read_failed',
    WRITE_FAILED = 'storage_write_failed',
    DELETE_FAILED = 'storage_delete_failed',

    // Configuration
    INVALID_CONFIG = 'storage_invalid_config',
    INVALID_KEY = 'storage_invalid_key',
    UNKNOWN_STORE_TYPE = 'storage_unknown_store_type',
}
