import type { ZodError } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Convert a ZodError into Issues tagged with the given scope
 */
export function zodToIssues(
    error: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue[] {
    return error.issues.map((issue) => ({
        code: 'schema_validation',
        message: issue.message,
        path: issue.path,
        severity,
        scope,
        type: ErrorType.USER,
    }));
}
