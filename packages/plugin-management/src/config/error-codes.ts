/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
    VALIDATION_FAILED = 'config_validation_failed',
    INVALID_ENV_KEY = 'config_invalid_env_key',
}
