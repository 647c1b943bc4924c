/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { DepotRuntimeError, isDepotRuntimeError } from './DepotRuntimeError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity } from './types.js';
