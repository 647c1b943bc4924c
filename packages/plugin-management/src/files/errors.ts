import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import { SharedFileErrorCode } from './error-codes.js';

export class SharedFileError {
    static languageNotFound(language: string, searchedRoots: string[]) {
        return new DepotRuntimeError(
            SharedFileErrorCode.LANGUAGE_NOT_FOUND,
            ErrorScope.SHARED,
            ErrorType.NOT_FOUND,
            `Failed to find the implementation for: ${language}`,
            { language, searchedRoots },
            'Install the language runner plugin or check the shared roots configuration'
        );
    }

    static skeletonNotFound(filename: string, searchedRoots: string[]) {
        return new DepotRuntimeError(
            SharedFileErrorCode.SKELETON_NOT_FOUND,
            ErrorScope.SHARED,
            ErrorType.NOT_FOUND,
            `Failed to find the skeleton file: ${filename}`,
            { filename, searchedRoots }
        );
    }

    static pluginsDirNotFound(searchedRoots: string[]) {
        return new DepotRuntimeError(
            SharedFileErrorCode.PLUGINS_DIR_NOT_FOUND,
            ErrorScope.SHARED,
            ErrorType.NOT_FOUND,
            'Failed to find the plugins directory',
            { searchedRoots }
        );
    }

    static readFailed(filePath: string, cause: string) {
        return new DepotRuntimeError(
            SharedFileErrorCode.READ_FAILED,
            ErrorScope.SHARED,
            ErrorType.SYSTEM,
            `Failed to read: ${filePath}. ${cause}`,
            { filePath, cause }
        );
    }

    static sourceMissing(sourcePath: string) {
        return new DepotRuntimeError(
            SharedFileErrorCode.SOURCE_MISSING,
            ErrorScope.SHARED,
            ErrorType.NOT_FOUND,
            `${sourcePath} doesn't exist`,
            { sourcePath }
        );
    }
}
