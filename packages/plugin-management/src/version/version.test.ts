import { describe, it, expect } from 'vitest';
import { isDepotRuntimeError } from '@plugin-depot/core';
import {
    parseVersion,
    tryParseVersion,
    formatVersion,
    compareVersions,
    isGreaterThan,
    latestVersion,
} from './version.js';
import { VersionErrorCode } from './error-codes.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected function to throw');
}

describe('parseVersion', () => {
    it('parses three decimal components', () => {
        expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 });
        expect(parseVersion('0.0.0')).toEqual({ major: 0, minor: 0, patch: 0 });
    });

    it('round-trips through the canonical form', () => {
        for (const text of ['0.1.0', '1.2.3', '10.20.30', '2.0.145']) {
            expect(formatVersion(parseVersion(text))).toBe(text);
        }
    });

    it('accepts leading zeros as decimal', () => {
        const version = parseVersion('01.2.3');
        expect(version.major).toBe(1);
        expect(formatVersion(version)).toBe('1.2.3');
        expect(parseVersion('1.08.09')).toEqual({ major: 1, minor: 8, patch: 9 });
    });

    it('returns frozen values', () => {
        expect(Object.isFrozen(parseVersion('1.0.0'))).toBe(true);
    });

    it.each(['1.2', '1', '1.2.3.4', '', 'bogus'])(
        'rejects %j with a segment count error',
        (text) => {
            const error = captureError(() => parseVersion(text));
            expect(isDepotRuntimeError(error, VersionErrorCode.WRONG_SEGMENT_COUNT)).toBe(true);
        }
    );

    it('reports the offending segment and its position', () => {
        const error = captureError(() => parseVersion('1.x.3'));
        expect(error).toMatchObject({
            code: VersionErrorCode.NON_NUMERIC_COMPONENT,
            context: { text: '1.x.3', segment: 'x', position: 1 },
        });
    });

    it.each(['-1.0.0', '1.-2.0', '+1.0.0', '1.0.0-beta', ' 1.0.0', '1..0', '1.0.0x', '1.0.1e3'])(
        'rejects %j as non-numeric',
        (text) => {
            const error = captureError(() => parseVersion(text));
            expect(isDepotRuntimeError(error, VersionErrorCode.NON_NUMERIC_COMPONENT)).toBe(true);
        }
    );
});

describe('tryParseVersion', () => {
    it('returns null instead of throwing', () => {
        expect(tryParseVersion('bogus')).toBeNull();
        expect(tryParseVersion('2.0.0')).toEqual({ major: 2, minor: 0, patch: 0 });
    });
});

describe('compareVersions', () => {
    const v = parseVersion;

    it('orders by major, then minor, then patch', () => {
        expect(compareVersions(v('2.0.0'), v('1.9.9'))).toBeGreaterThan(0);
        expect(compareVersions(v('1.3.0'), v('1.2.10'))).toBeGreaterThan(0);
        expect(compareVersions(v('1.2.10'), v('1.2.9'))).toBeGreaterThan(0);
        expect(compareVersions(v('1.2.9'), v('1.2.10'))).toBeLessThan(0);
    });

    it('treats equal triples as neither greater', () => {
        expect(compareVersions(v('1.2.3'), v('01.02.03'))).toBe(0);
        expect(isGreaterThan(v('1.2.3'), v('1.2.3'))).toBe(false);
    });

    it('is antisymmetric and transitive over a sample', () => {
        const sample = ['0.0.1', '0.1.0', '1.0.0', '1.0.10', '1.1.0', '2.0.0'].map(v);
        for (const a of sample) {
            for (const b of sample) {
                expect(Math.sign(compareVersions(a, b))).toBe(-Math.sign(compareVersions(b, a)));
                for (const c of sample) {
                    if (isGreaterThan(a, b) && isGreaterThan(b, c)) {
                        expect(isGreaterThan(a, c)).toBe(true);
                    }
                }
            }
        }
    });
});

describe('latestVersion', () => {
    const v = parseVersion;

    it('picks the greatest version', () => {
        expect(formatVersion(latestVersion([v('1.2.9'), v('1.3.0'), v('1.2.10')]))).toBe('1.3.0');
    });

    it('returns the only element of a singleton', () => {
        const only = v('4.5.6');
        expect(latestVersion([only])).toBe(only);
    });

    it('is independent of input order', () => {
        const versions = [v('0.9.0'), v('1.0.0'), v('0.10.0'), v('1.0.0')];
        const forward = latestVersion(versions);
        const backward = latestVersion([...versions].reverse());
        expect(formatVersion(forward)).toBe('1.0.0');
        expect(compareVersions(forward, backward)).toBe(0);
    });

    it('fails loudly on an empty set', () => {
        const error = captureError(() => latestVersion([]));
        expect(isDepotRuntimeError(error, VersionErrorCode.EMPTY_VERSION_SET)).toBe(true);
    });
});
