import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import type { Issue } from '@plugin-depot/core';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Configuration error factory methods
 */
export class ConfigError {
    static fileReadError(configPath: string, cause: string) {
        return new DepotRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read config file ${configPath}: ${cause}`,
            { configPath, cause },
            'Check file permissions'
        );
    }

    static parseError(configPath: string, cause: string) {
        return new DepotRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse config file ${configPath}: ${cause}`,
            { configPath, cause },
            'Ensure the file contains valid YAML'
        );
    }

    static validationFailed(issues: Issue[], source: string) {
        const details = issues
            .map((issue) => `${issue.path?.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        return new DepotRuntimeError(
            ConfigErrorCode.VALIDATION_FAILED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid configuration from ${source}: ${details}`,
            { source, issues },
            'Fix the listed fields and try again'
        );
    }

    static invalidEnvKey(key: string) {
        return new DepotRuntimeError(
            ConfigErrorCode.INVALID_ENV_KEY,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid environment variable name: '${key}'`,
            { key }
        );
    }
}
