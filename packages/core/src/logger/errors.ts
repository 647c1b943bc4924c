import { DepotRuntimeError } from '../errors/DepotRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

export class LoggerError {
    static fileTransportFailed(filePath: string, reason: string): DepotRuntimeError {
        return new DepotRuntimeError(
            LoggerErrorCode.FILE_TRANSPORT_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Cannot log to ${filePath}: ${reason}`,
            { filePath, reason },
            'Point the file transport at a writable directory'
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): DepotRuntimeError {
        return new DepotRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels: [...validLevels] }
        );
    }
}
