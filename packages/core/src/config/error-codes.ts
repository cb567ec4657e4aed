/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    INVALID_CONFIG = 'config_invalid',
    ENV_INVALID = 'config_env_invalid',
    DOTENV_READ_FAILED = 'config_dotenv_read_failed',
    HTTP_SINK_INCOMPLETE = 'config_http_sink_incomplete',

    // Scope configuration file
    SCOPE_FILE_NOT_FOUND = 'config_scope_file_not_found',
    SCOPE_FILE_READ_FAILED = 'config_scope_file_read_failed',
    SCOPE_FILE_PARSE_FAILED = 'config_scope_file_parse_failed',
    SCOPE_FILE_INVALID = 'config_scope_file_invalid',
}
