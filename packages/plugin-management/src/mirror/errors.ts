import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import { MirrorErrorCode } from './error-codes.js';

export class MirrorError {
    static sourceNotDirectory(sourcePath: string) {
        return new DepotRuntimeError(
            MirrorErrorCode.SOURCE_NOT_DIRECTORY,
            ErrorScope.MIRROR,
            ErrorType.USER,
            `Mirror source is not a directory: ${sourcePath}`,
            { sourcePath }
        );
    }

    static unsupportedEntry(entryPath: string, kind: string) {
        return new DepotRuntimeError(
            MirrorErrorCode.UNSUPPORTED_ENTRY,
            ErrorScope.MIRROR,
            ErrorType.SYSTEM,
            `Cannot mirror ${kind} at ${entryPath}: only regular files and directories are supported`,
            { entryPath, kind },
            'Remove links and special files from the source tree before installing'
        );
    }
}
