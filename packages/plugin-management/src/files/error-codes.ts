/**
 * Shared-file lookup and file helper error codes
 */
export enum SharedFileErrorCode {
    LANGUAGE_NOT_FOUND = 'shared_language_not_found',
    SKELETON_NOT_FOUND = 'shared_skeleton_not_found',
    PLUGINS_DIR_NOT_FOUND = 'shared_plugins_dir_not_found',
    READ_FAILED = 'shared_file_read_failed',
    SOURCE_MISSING = 'shared_file_source_missing',
}
