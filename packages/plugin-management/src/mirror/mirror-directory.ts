/**
 * Directory Mirroring
 *
 * One-way, change-aware copy of a source tree onto a destination tree. A destination file
 * whose executable bit, size and mtime (whole seconds) match the source is left alone, so
 * mirroring an unchanged tree twice writes nothing the second time.
 *
 * The caller owns the destination for the duration of the call. A failed mirror may leave a
 * partial tree; running it again completes the remaining copies.
 */

import * as path from 'path';
import {
    chmodSync,
    copyFileSync,
    lstatSync,
    mkdirSync,
    readdirSync,
    statSync,
    unlinkSync,
    utimesSync,
} from 'fs';
import type { Stats } from 'fs';
import { createSilentLogger, DepotLogComponent } from '@plugin-depot/core';
import type { Logger } from '@plugin-depot/core';
import { NEW_DIRECTORY_PERMISSIONS } from '../constants.js';
import { MirrorError } from './errors.js';

export interface MirrorOptions {
    logger?: Logger;
}

export interface MirrorResult {
    /** Paths relative to the source root that were created or overwritten, in traversal order */
    written: string[];
}

const ANY_EXECUTE = 0o111;
const OWNER_WRITE = 0o200;
const PERMISSION_BITS = 0o7777;

/**
 * Mirror `srcDir` into `dstDir`.
 *
 * @throws DepotRuntimeError `mirror_source_not_directory` or `mirror_unsupported_entry`;
 *   filesystem errors propagate unmodified
 */
export function mirrorDirectory(
    srcDir: string,
    dstDir: string,
    options: MirrorOptions = {}
): MirrorResult {
    const logger = (options.logger ?? createSilentLogger()).createChild(DepotLogComponent.MIRROR);
    const sourceRoot = path.resolve(srcDir);
    const destRoot = path.resolve(dstDir);

    if (!statSync(sourceRoot).isDirectory()) {
        throw MirrorError.sourceNotDirectory(sourceRoot);
    }

    const written: string[] = [];

    const visit = (dir: string): void => {
        const names = readdirSync(dir).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

        for (const name of names) {
            const srcPath = path.join(dir, name);
            const srcStat = lstatSync(srcPath);

            if (srcStat.isDirectory()) {
                // A link or file where a directory belongs would redirect writes outside destRoot
                const dstDirPath = path.join(destRoot, path.relative(sourceRoot, srcPath));
                const dstDirStat = statIfExists(dstDirPath);
                if (dstDirStat && !dstDirStat.isDirectory()) {
                    unlinkSync(dstDirPath);
                }
                visit(srcPath);
                continue;
            }
            if (!srcStat.isFile()) {
                throw MirrorError.unsupportedEntry(srcPath, describeEntry(srcStat));
            }

            const relativePath = path.relative(sourceRoot, srcPath);
            const dstPath = path.join(destRoot, relativePath);
            const dstStat = statIfExists(dstPath);

            if (dstStat?.isFile() && isUnmodified(srcStat, dstStat)) {
                continue;
            }

            copyEntry(srcPath, dstPath, srcStat, dstStat);
            written.push(relativePath);
            logger.debug(`Mirrored ${relativePath}`, { source: srcPath, destination: dstPath });
        }
    };

    visit(sourceRoot);

    logger.info(`Mirrored ${written.length} file(s) into ${destRoot}`, {
        source: sourceRoot,
        destination: destRoot,
        written: written.length,
    });

    return { written };
}

function isUnmodified(src: Stats, dst: Stats): boolean {
    return (
        isExecutable(src) === isExecutable(dst) &&
        src.size === dst.size &&
        Math.floor(src.mtimeMs / 1000) === Math.floor(dst.mtimeMs / 1000)
    );
}

function isExecutable(stat: Stats): boolean {
    return (stat.mode & ANY_EXECUTE) !== 0;
}

function copyEntry(srcPath: string, dstPath: string, srcStat: Stats, dstStat: Stats | null): void {
    mkdirSync(path.dirname(dstPath), { recursive: true, mode: NEW_DIRECTORY_PERMISSIONS });

    if (dstStat && !dstStat.isFile() && !dstStat.isDirectory()) {
        // Replace the link itself; copying through it would write outside the destination
        unlinkSync(dstPath);
    } else if (dstStat?.isFile() && (dstStat.mode & OWNER_WRITE) === 0) {
        // A read-only file from an earlier mirror must be writable before it can be replaced
        chmodSync(dstPath, (dstStat.mode & PERMISSION_BITS) | OWNER_WRITE);
    }

    copyFileSync(srcPath, dstPath);
    chmodSync(dstPath, srcStat.mode & PERMISSION_BITS);
    utimesSync(dstPath, srcStat.atime, srcStat.mtime);
}

function statIfExists(filePath: string): Stats | null {
    try {
        return lstatSync(filePath);
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            return null;
        }
        throw error;
    }
}

function describeEntry(stat: Stats): string {
    if (stat.isSymbolicLink()) return 'symbolic link';
    if (stat.isBlockDevice() || stat.isCharacterDevice()) return 'device';
    if (stat.isFIFO()) return 'FIFO';
    if (stat.isSocket()) return 'socket';
    return 'special file';
}
