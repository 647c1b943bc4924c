import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { NEW_FILE_PERMISSIONS } from '../constants.js';
import { SharedFileError } from './errors.js';

export function fileExists(filePath: string): boolean {
    return existsSync(filePath);
}

export function dirExists(dirPath: string): boolean {
    try {
        return statSync(dirPath).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Read a UTF-8 file
 * @throws DepotRuntimeError `shared_file_read_failed`
 */
export function readFileContents(filePath: string): string {
    try {
        return readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw SharedFileError.readFailed(
            filePath,
            error instanceof Error ? error.message : String(error)
        );
    }
}

/**
 * Copy a file's bytes; a newly created destination gets mode 0644.
 * Other I/O failures propagate as-is.
 */
export function copyFile(src: string, dest: string): void {
    if (!fileExists(src)) {
        throw SharedFileError.sourceMissing(src);
    }
    writeFileSync(dest, readFileSync(src), { mode: NEW_FILE_PERMISSIONS });
}
