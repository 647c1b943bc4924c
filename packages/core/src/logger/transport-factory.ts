import type { LoggerTransport } from './types.js';
import type { LoggerTransportConfig } from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LoggerError } from './errors.js';

/**
 * Build transports from validated configuration. `silent` entries contribute nothing.
 * @throws DepotRuntimeError `logger_file_transport_failed` when a log directory can't be created
 */
export function createTransports(configs: LoggerTransportConfig[]): LoggerTransport[] {
    return configs.flatMap((config): LoggerTransport[] => {
        switch (config.type) {
            case 'silent':
                return [];
            case 'console':
                return [new ConsoleTransport({ colorize: config.colorize })];
            case 'file':
                try {
                    return [new FileTransport({ path: config.path })];
                } catch (error) {
                    throw LoggerError.fileTransportFailed(
                        config.path,
                        error instanceof Error ? error.message : String(error)
                    );
                }
        }
    });
}
