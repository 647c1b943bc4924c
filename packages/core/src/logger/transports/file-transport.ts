/**
 * File Transport
 *
 * Appends each entry to a file as one JSON line. Appends are synchronous, so a command
 * that exits right after an install still leaves a complete log behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Log file; missing parent directories are created */
    path: string;
}

export class FileTransport implements LoggerTransport {
    private readonly filePath: string;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }

    write(entry: LogEntry): void {
        fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    }

    getFilePath(): string {
        return this.filePath;
    }
}
