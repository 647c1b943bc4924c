import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import { DownloadErrorCode } from './error-codes.js';

/**
 * Download error factory methods
 */
export class DownloadError {
    static invalidCommand(commandLine: string) {
        return new DepotRuntimeError(
            DownloadErrorCode.INVALID_COMMAND,
            ErrorScope.DOWNLOAD,
            ErrorType.USER,
            `Invalid executable command: '${commandLine}'`,
            { commandLine }
        );
    }

    static invalidUrl(url: string) {
        return new DepotRuntimeError(
            DownloadErrorCode.INVALID_URL,
            ErrorScope.DOWNLOAD,
            ErrorType.USER,
            `Cannot download '${url}': expected an absolute URL ending in a file name`,
            { url }
        );
    }

    static targetDirMissing(targetDir: string) {
        return new DepotRuntimeError(
            DownloadErrorCode.TARGET_DIR_MISSING,
            ErrorScope.DOWNLOAD,
            ErrorType.NOT_FOUND,
            `${targetDir} doesn't exist`,
            { targetDir },
            'Create the target directory before downloading into it'
        );
    }

    static commandFailed(command: string, exitCode: number, url: string) {
        return new DepotRuntimeError(
            DownloadErrorCode.COMMAND_FAILED,
            ErrorScope.DOWNLOAD,
            ErrorType.THIRD_PARTY,
            `${command} exited with code ${exitCode} while downloading ${url}`,
            { command, exitCode, url },
            `Check the URL and your network connection, or run ${command} manually`
        );
    }

    static httpError(url: string, status: number, statusText: string) {
        return new DepotRuntimeError(
            DownloadErrorCode.HTTP_ERROR,
            ErrorScope.DOWNLOAD,
            ErrorType.THIRD_PARTY,
            `Download of ${url} failed: HTTP ${status} ${statusText}`.trimEnd(),
            { url, status, statusText }
        );
    }
}
