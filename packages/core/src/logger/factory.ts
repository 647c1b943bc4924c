/**
 * Logger Factory
 *
 * Creates logger instances from validated configuration.
 */

import type { LoggerConfig } from './schemas.js';
import type { Logger, LogLevel } from './types.js';
import { DepotLogComponent, LOG_LEVELS } from './types.js';
import { DepotLogger } from './depot-logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    /** Component identifier (defaults to CLI) */
    component?: DepotLogComponent;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: depotConfig.logger,
 *   component: DepotLogComponent.INSTALL,
 * });
 *
 * logger.info('Installing plugin');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, component = DepotLogComponent.CLI } = options;

    return new DepotLogger({
        level: config.level,
        component,
        transports: createTransports(config.transports),
    });
}

/**
 * Logger that records nothing. Used by components when the caller passes no logger.
 */
export function createSilentLogger(component: DepotLogComponent = DepotLogComponent.CLI): Logger {
    return new DepotLogger({
        level: 'error',
        component,
        transports: [],
    });
}

/**
 * Validate a log level coming from an untyped source (environment, CLI flag)
 */
export function parseLogLevel(value: string): LogLevel {
    const normalized = value.trim().toLowerCase();
    const match = LOG_LEVELS.find((level) => level === normalized);
    if (!match) {
        throw LoggerError.invalidLogLevel(value, LOG_LEVELS);
    }
    return match;
}
