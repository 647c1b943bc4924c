import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error thrown by every plugin-depot module.
 *
 * Carries a module-specific `code`, the functional `scope` that raised it, the `type`
 * of failure, structured `context` for logs and an optional `recovery` hint for users.
 */
export class DepotRuntimeError<C extends Record<string, unknown> = Record<string, unknown>> extends Error {
    public readonly code: string;
    public readonly scope: ErrorScope;
    public readonly type: ErrorType;
    public readonly context: C | undefined;
    public readonly recovery: string | undefined;

    constructor(
        code: string,
        scope: ErrorScope,
        type: ErrorType,
        message: string,
        context?: C,
        recovery?: string
    ) {
        super(message);
        this.name = 'DepotRuntimeError';
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
        this.recovery = recovery;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            context: this.context,
            recovery: this.recovery,
        };
    }
}

/**
 * Narrow an unknown value to a DepotRuntimeError, optionally with a specific code
 */
export function isDepotRuntimeError(error: unknown, code?: string): error is DepotRuntimeError {
    if (!(error instanceof DepotRuntimeError)) {
        return false;
    }
    return code === undefined || error.code === code;
}
