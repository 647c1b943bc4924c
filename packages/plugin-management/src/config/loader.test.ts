import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { loadDepotConfig, splitRootList } from './loader.js';
import { setEnvVariable } from './env.js';
import { ConfigErrorCode } from './error-codes.js';

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('expected promise to reject');
}

describe('loadDepotConfig', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(tmpdir(), 'plugin-depot-config-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('falls back to defaults when no file or environment is present', async () => {
        const config = await loadDepotConfig({ cwd: tempDir, env: {} });

        expect(config.sharedRoots).toEqual(['/usr/local/share/plugin-depot', '/usr/share/plugin-depot']);
        expect(config.pluginRoots).toEqual([
            '/usr/local/share/plugin-depot/plugins',
            '/usr/share/plugin-depot/plugins',
        ]);
        expect(config.logger).toEqual({
            level: 'info',
            transports: [{ type: 'console', colorize: true }],
        });
    });

    it('reads the YAML file and resolves relative roots against cwd', async () => {
        fs.writeFileSync(
            path.join(tempDir, 'plugin-depot.yml'),
            ['sharedRoots:', '  - share', 'logger:', '  level: debug', '  transports:', '    - type: silent', ''].join(
                '\n'
            )
        );

        const config = await loadDepotConfig({ cwd: tempDir, env: {} });

        expect(config.sharedRoots).toEqual([path.join(tempDir, 'share')]);
        expect(config.pluginRoots).toEqual([path.join(tempDir, 'share', 'plugins')]);
        expect(config.logger).toEqual({ level: 'debug', transports: [{ type: 'silent' }] });
    });

    it('lets the environment override the file and overrides win over both', async () => {
        fs.writeFileSync(path.join(tempDir, 'plugin-depot.yml'), 'pluginRoots: [/from/file]\n');
        const env = {
            PLUGIN_DEPOT_PLUGIN_ROOTS: ['/env/one', '', '/env/two'].join(path.delimiter),
            PLUGIN_DEPOT_LOG_LEVEL: 'WARN',
        };

        const fromEnv = await loadDepotConfig({ cwd: tempDir, env });
        expect(fromEnv.pluginRoots).toEqual(['/env/one', '/env/two']);
        expect(fromEnv.logger.level).toBe('warn');

        const overridden = await loadDepotConfig({
            cwd: tempDir,
            env,
            overrides: { pluginRoots: ['/cli/root'], logger: { level: 'error' } },
        });
        expect(overridden.pluginRoots).toEqual(['/cli/root']);
        expect(overridden.logger.level).toBe('error');
    });

    it('treats an empty file as no configuration', async () => {
        fs.writeFileSync(path.join(tempDir, 'plugin-depot.yml'), '');
        const config = await loadDepotConfig({ cwd: tempDir, env: {} });
        expect(config.sharedRoots).toHaveLength(2);
    });

    it('rejects invalid YAML', async () => {
        fs.writeFileSync(path.join(tempDir, 'plugin-depot.yml'), 'sharedRoots: [unclosed\n');
        const error = await captureRejection(loadDepotConfig({ cwd: tempDir, env: {} }));
        expect(error).toMatchObject({ code: ConfigErrorCode.PARSE_ERROR });
    });

    it('rejects unknown keys and wrong types with their paths', async () => {
        fs.writeFileSync(path.join(tempDir, 'plugin-depot.yml'), 'pluginRoots: [1]\n');
        const error = await captureRejection(loadDepotConfig({ cwd: tempDir, env: {} }));
        expect(error).toMatchObject({ code: ConfigErrorCode.VALIDATION_FAILED });
        expect(error instanceof Error && error.message).toContain('pluginRoots.0');
    });

    it('rejects an invalid log level from the environment', async () => {
        const error = await captureRejection(
            loadDepotConfig({ cwd: tempDir, env: { PLUGIN_DEPOT_LOG_LEVEL: 'loud' } })
        );
        expect(error).toMatchObject({
            code: ConfigErrorCode.VALIDATION_FAILED,
            context: { source: 'environment' },
        });
    });
});

describe('splitRootList', () => {
    it('returns undefined for unset or blank values', () => {
        expect(splitRootList(undefined)).toBeUndefined();
        expect(splitRootList('  ')).toBeUndefined();
    });

    it('splits on the platform delimiter', () => {
        expect(splitRootList(`/a${path.delimiter} /b `)).toEqual(['/a', '/b']);
    });
});

describe('setEnvVariable', () => {
    it('assigns non-blank values', () => {
        const env: NodeJS.ProcessEnv = {};
        setEnvVariable('PLUGIN_HOME', '/opt/plugins', env);
        expect(env).toEqual({ PLUGIN_HOME: '/opt/plugins' });
    });

    it('ignores blank values', () => {
        const env: NodeJS.ProcessEnv = {};
        setEnvVariable('PLUGIN_HOME', '   ', env);
        expect(env).toEqual({});
    });

    it('rejects malformed keys', () => {
        expect(() => setEnvVariable('A=B', 'x', {})).toThrow("Invalid environment variable name: 'A=B'");
    });
});
