import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import { VersionErrorCode } from './error-codes.js';

/**
 * Version error factory methods
 */
export class VersionError {
    static wrongSegmentCount(text: string, segmentCount: number) {
        return new DepotRuntimeError(
            VersionErrorCode.WRONG_SEGMENT_COUNT,
            ErrorScope.VERSION,
            ErrorType.USER,
            `Invalid version '${text}': wrong segment count (expected 3, got ${segmentCount})`,
            { text, segmentCount },
            'Versions must look like major.minor.patch, e.g. 1.4.0'
        );
    }

    static nonNumericComponent(text: string, segment: string, position: number) {
        return new DepotRuntimeError(
            VersionErrorCode.NON_NUMERIC_COMPONENT,
            ErrorScope.VERSION,
            ErrorType.USER,
            `Invalid version '${text}': non-numeric component '${segment}' at position ${position}`,
            { text, segment, position },
            'Each version component must be a non-negative decimal integer'
        );
    }

    static emptyVersionSet() {
        return new DepotRuntimeError(
            VersionErrorCode.EMPTY_VERSION_SET,
            ErrorScope.VERSION,
            ErrorType.SYSTEM,
            'Cannot select the latest version from an empty set',
            {}
        );
    }
}
