/**
 * Plugin Installation
 *
 * Installs a plugin version from an already unpacked source tree. The version directory is
 * allocated under the root that already holds the plugin (so upgrades land next to older
 * versions), or under the first configured root for a new plugin. Files are then mirrored,
 * which makes re-running an interrupted install cheap.
 *
 * Callers serialise installs of the same plugin; nothing here locks.
 */

import * as path from 'path';
import { mkdirSync } from 'fs';
import { createSilentLogger, DepotLogComponent } from '@plugin-depot/core';
import type { Logger } from '@plugin-depot/core';
import { NEW_DIRECTORY_PERMISSIONS } from '../constants.js';
import { mirrorDirectory } from '../mirror/index.js';
import { formatVersion, parseVersion } from '../version/index.js';
import { PluginError } from './errors.js';
import type { PluginLocator } from './locator.js';
import type { InstallFromDirectoryRequest, InstallFromDirectoryResult } from './types.js';

export interface InstallPluginDependencies {
    locator: PluginLocator;
    logger?: Logger;
}

/**
 * Install `request.sourceDir` as `<root>/<pluginName>/<version>`
 *
 * @throws DepotRuntimeError for an invalid version or name, or when no roots are configured;
 *   mirror failures propagate unmodified
 */
export function installPluginFromDirectory(
    request: InstallFromDirectoryRequest,
    deps: InstallPluginDependencies
): InstallFromDirectoryResult {
    const { pluginName, sourceDir } = request;
    const logger = (deps.logger ?? createSilentLogger()).createChild(DepotLogComponent.INSTALL);
    const version = formatVersion(parseVersion(request.version));

    const installPath = resolveInstallPath(deps.locator, pluginName, version);
    logger.info(`Installing ${pluginName}@${version}`, { sourceDir, installPath });

    mkdirSync(installPath, { recursive: true, mode: NEW_DIRECTORY_PERMISSIONS });
    const { written } = mirrorDirectory(sourceDir, installPath, { logger });

    logger.info(
        written.length === 0
            ? `${pluginName}@${version} is up to date`
            : `${pluginName}@${version}: ${written.length} file(s) updated`,
        { installPath, written: written.length }
    );

    return { installPath, written };
}

function resolveInstallPath(locator: PluginLocator, pluginName: string, version: string): string {
    if (locator.findPluginRoot(pluginName) !== null) {
        return locator.locate(pluginName, version);
    }

    const [firstRoot] = locator.getRoots();
    if (firstRoot === undefined) {
        throw PluginError.noInstallRoot(pluginName);
    }
    return path.join(firstRoot, pluginName, version);
}
