/**
 * Directory mirroring error codes
 */
export enum MirrorErrorCode {
    SOURCE_NOT_DIRECTORY = 'mirror_source_not_directory',
    UNSUPPORTED_ENTRY = 'mirror_unsupported_entry',
}
