/**
 * Semantic versions of installed plugins.
 *
 * A version is exactly `major.minor.patch` with non-negative decimal components.
 * Leading zeros are accepted (`01.2.3` is 1.2.3); signs, whitespace, pre-release
 * and build suffixes are not.
 */

import { VersionError } from './errors.js';

export interface Version {
    readonly major: number;
    readonly minor: number;
    readonly patch: number;
}

const DECIMAL = /^[0-9]+$/;

/**
 * Parse `major.minor.patch`.
 * @throws DepotRuntimeError `version_wrong_segment_count` or `version_non_numeric_component`
 */
export function parseVersion(text: string): Version {
    const segments = text.split('.');
    if (segments.length !== 3) {
        throw VersionError.wrongSegmentCount(text, segments.length);
    }

    const [major, minor, patch] = segments.map((segment, position) => {
        const value = DECIMAL.test(segment) ? Number.parseInt(segment, 10) : Number.NaN;
        if (!Number.isSafeInteger(value)) {
            throw VersionError.nonNumericComponent(text, segment, position);
        }
        return value;
    });

    if (major === undefined || minor === undefined || patch === undefined) {
        throw VersionError.wrongSegmentCount(text, segments.length);
    }

    return Object.freeze({ major, minor, patch });
}

/**
 * Parse without throwing. Returns null for anything that is not a version.
 */
export function tryParseVersion(text: string): Version | null {
    try {
        return parseVersion(text);
    } catch {
        return null;
    }
}

/**
 * Canonical `major.minor.patch` form
 */
export function formatVersion(version: Version): string {
    return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Lexicographic comparison on (major, minor, patch).
 * Negative when a < b, zero when equal, positive when a > b.
 */
export function compareVersions(a: Version, b: Version): number {
    if (a.major !== b.major) return a.major - b.major;
    if (a.minor !== b.minor) return a.minor - b.minor;
    return a.patch - b.patch;
}

export function isGreaterThan(a: Version, b: Version): boolean {
    return compareVersions(a, b) > 0;
}

export function versionsEqual(a: Version, b: Version): boolean {
    return compareVersions(a, b) === 0;
}

/**
 * Greatest version in a non-empty collection.
 * Ties keep the first occurrence, so the result equals the same maximum regardless of order.
 * @throws DepotRuntimeError `version_empty_set` for an empty collection
 */
export function latestVersion<V extends Version>(versions: Iterable<V>): V {
    let latest: V | undefined;
    for (const version of versions) {
        if (latest === undefined || isGreaterThan(version, latest)) {
            latest = version;
        }
    }
    if (latest === undefined) {
        throw VersionError.emptyVersionSet();
    }
    return latest;
}
