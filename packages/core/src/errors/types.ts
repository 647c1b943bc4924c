/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    VERSION = 'version', // Version parsing, ordering and selection
    PLUGIN = 'plugin', // Plugin location, enumeration, properties and installation
    MIRROR = 'mirror', // Directory mirroring
    CONFIG = 'config', // Configuration file operations, parsing, validation
    SHARED = 'shared', // Shared-file lookup (languages, skeletons, plugin roots)
    DOWNLOAD = 'download', // Artifact downloads
    LOGGER = 'logger', // Logging system operations, transports, and configuration
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 403 - permission denied
    NOT_FOUND = 'not_found', // 404 - plugin, version or file doesn't exist
    CONFLICT = 'conflict', // 409 - resource conflict
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream failures (download tools, HTTP servers)
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
