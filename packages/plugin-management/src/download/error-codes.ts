/**
 * Download error codes
 */
export enum DownloadErrorCode {
    INVALID_COMMAND = 'download_invalid_command',
    INVALID_URL = 'download_invalid_url',
    TARGET_DIR_MISSING = 'download_target_dir_missing',
    COMMAND_FAILED = 'download_command_failed',
    HTTP_ERROR = 'download_http_error',
}
