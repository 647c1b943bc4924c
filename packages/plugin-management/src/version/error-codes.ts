/**
 * Version parsing and selection error codes
 */
export enum VersionErrorCode {
    WRONG_SEGMENT_COUNT = 'version_wrong_segment_count',
    NON_NUMERIC_COMPONENT = 'version_non_numeric_component',
    EMPTY_VERSION_SET = 'version_empty_set',
}
