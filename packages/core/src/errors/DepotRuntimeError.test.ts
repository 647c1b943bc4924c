import { describe, it, expect } from 'vitest';
import { DepotRuntimeError, isDepotRuntimeError } from './DepotRuntimeError.js';
import { ErrorScope, ErrorType } from './types.js';

describe('DepotRuntimeError', () => {
    const error = new DepotRuntimeError(
        'plugin_not_installed',
        ErrorScope.PLUGIN,
        ErrorType.NOT_FOUND,
        "Plugin 'foo' is not installed",
        { pluginName: 'foo' },
        'Install it first'
    );

    it('carries code, scope, type, context and recovery', () => {
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('DepotRuntimeError');
        expect(error.code).toBe('plugin_not_installed');
        expect(error.scope).toBe(ErrorScope.PLUGIN);
        expect(error.type).toBe(ErrorType.NOT_FOUND);
        expect(error.context).toEqual({ pluginName: 'foo' });
        expect(error.recovery).toBe('Install it first');
    });

    it('serialises to a plain object', () => {
        expect(error.toJSON()).toEqual({
            name: 'DepotRuntimeError',
            code: 'plugin_not_installed',
            scope: 'plugin',
            type: 'not_found',
            message: "Plugin 'foo' is not installed",
            context: { pluginName: 'foo' },
            recovery: 'Install it first',
        });
    });

    it('narrows by class and optional code', () => {
        expect(isDepotRuntimeError(error)).toBe(true);
        expect(isDepotRuntimeError(error, 'plugin_not_installed')).toBe(true);
        expect(isDepotRuntimeError(error, 'other_code')).toBe(false);
        expect(isDepotRuntimeError(new Error('plain'))).toBe(false);
    });
});
