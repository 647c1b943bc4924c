/**
 * Logger error codes
 */
export enum LoggerErrorCode {
    FILE_TRANSPORT_FAILED = 'logger_file_transport_failed',
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
