import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { createMockLogger } from '@plugin-depot/core/test-utils';
import { installPluginFromDirectory } from './install-plugin.js';
import { PluginLocator } from './locator.js';
import { PluginErrorCode } from './error-codes.js';
import { VersionErrorCode } from '../version/index.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected function to throw');
}

describe('installPluginFromDirectory', () => {
    let tempDir: string;
    let sourceDir: string;
    let r1: string;
    let r2: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(tmpdir(), 'plugin-depot-install-'));
        sourceDir = path.join(tempDir, 'src');
        r1 = path.join(tempDir, 'r1');
        r2 = path.join(tempDir, 'r2');
        fs.mkdirSync(path.join(sourceDir, 'bin'), { recursive: true });
        fs.writeFileSync(path.join(sourceDir, 'plugin.json'), '{"version":"1.0.0"}');
        fs.writeFileSync(path.join(sourceDir, 'bin', 'run'), '#!/bin/sh\n');
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('installs a new plugin under the first root', () => {
        const locator = new PluginLocator({ roots: [r1, r2] });

        const result = installPluginFromDirectory(
            { pluginName: 'greeter', version: '1.0.0', sourceDir },
            { locator }
        );

        const installPath = path.join(r1, 'greeter', '1.0.0');
        expect(result.installPath).toBe(installPath);
        expect(result.written).toEqual([path.join('bin', 'run'), 'plugin.json']);
        expect(fs.readFileSync(path.join(installPath, 'bin', 'run'), 'utf-8')).toBe('#!/bin/sh\n');
        expect(locator.locate('greeter')).toBe(installPath);
    });

    it('places upgrades next to the versions already installed', () => {
        fs.mkdirSync(path.join(r2, 'greeter', '1.0.0'), { recursive: true });
        const locator = new PluginLocator({ roots: [r1, r2] });

        const result = installPluginFromDirectory(
            { pluginName: 'greeter', version: '1.1.0', sourceDir },
            { locator }
        );

        expect(result.installPath).toBe(path.join(r2, 'greeter', '1.1.0'));
        expect(locator.locate('greeter')).toBe(path.join(r2, 'greeter', '1.1.0'));
    });

    it('normalises the version directory name', () => {
        const locator = new PluginLocator({ roots: [r1] });

        const result = installPluginFromDirectory(
            { pluginName: 'greeter', version: '01.02.003', sourceDir },
            { locator }
        );

        expect(result.installPath).toBe(path.join(r1, 'greeter', '1.2.3'));
    });

    it('writes nothing when reinstalling an unchanged tree', () => {
        const locator = new PluginLocator({ roots: [r1] });
        const logger = createMockLogger();
        const request = { pluginName: 'greeter', version: '1.0.0', sourceDir };

        installPluginFromDirectory(request, { locator, logger });
        const second = installPluginFromDirectory(request, { locator, logger });

        expect(second.written).toEqual([]);
        expect(logger.info).toHaveBeenLastCalledWith('greeter@1.0.0 is up to date', {
            installPath: path.join(r1, 'greeter', '1.0.0'),
            written: 0,
        });
    });

    it('rejects an invalid version before touching the roots', () => {
        const locator = new PluginLocator({ roots: [r1] });

        const error = captureError(() =>
            installPluginFromDirectory(
                { pluginName: 'greeter', version: 'latest', sourceDir },
                { locator }
            )
        );

        expect(error).toMatchObject({ code: VersionErrorCode.WRONG_SEGMENT_COUNT });
        expect(fs.existsSync(r1)).toBe(false);
    });

    it('fails when no roots are configured', () => {
        const locator = new PluginLocator({ roots: [] });

        const error = captureError(() =>
            installPluginFromDirectory(
                { pluginName: 'greeter', version: '1.0.0', sourceDir },
                { locator }
            )
        );

        expect(error).toMatchObject({ code: PluginErrorCode.NO_INSTALL_ROOT });
    });
});
