/**
 * Console Transport
 *
 * One line per entry on stderr, so stdout stays free for command output:
 * `info  mirror: Mirrored 2 file(s) into /opt/plugins/foo/1.0.0 written=2`
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    /** Colour the level label (default: true) */
    colorize?: boolean;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.dim,
};

export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        console.error(formatConsoleLine(entry, this.colorize));
    }
}

/**
 * Render an entry as `<level> <component>: <message> key=value ...`
 */
export function formatConsoleLine(entry: LogEntry, colorize = false): string {
    const label = entry.level.padEnd(5);
    const head = `${colorize ? LEVEL_STYLES[entry.level](label) : label} ${entry.component}: ${entry.message}`;

    const fields = Object.entries(entry.context ?? {}).map(
        ([key, value]) => `${key}=${formatValue(value)}`
    );
    return fields.length === 0 ? head : `${head} ${fields.join(' ')}`;
}

function formatValue(value: unknown): string {
    if (typeof value === 'string') {
        // Quote anything that would blur field boundaries
        return value === '' || /\s|"/.test(value) ? JSON.stringify(value) : value;
    }
    if (value === null || typeof value === 'object') {
        return JSON.stringify(value);
    }
    return String(value);
}
