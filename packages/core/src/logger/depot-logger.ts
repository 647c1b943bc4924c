/**
 * Depot Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, DepotLogComponent } from './types.js';

export interface DepotLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: DepotLogComponent;
    transports: LoggerTransport[];
}

/**
 * Level holder shared between a logger and its children
 */
interface LevelRef {
    current: LogLevel;
}

/**
 * DepotLogger - Multi-transport logger with structured logging
 */
export class DepotLogger implements Logger {
    private levelRef: LevelRef;
    private component: DepotLogComponent;
    private transports: LoggerTransport[];

    // Lower number = more severe
    // If level is 'debug', logs error(0), warn(1), info(2), debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: DepotLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    silly(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('silly')) {
            this.log('silly', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                transport.write(entry);
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return DepotLogger.LEVELS[level] <= DepotLogger.LEVELS[this.levelRef.current];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level reference
     */
    createChild(component: DepotLogComponent): DepotLogger {
        return new DepotLogger(
            {
                level: this.levelRef.current,
                component,
                transports: this.transports,
            },
            this.levelRef
        );
    }
}
