/**
 * Plugin Location
 *
 * Installed plugins live under one or more install prefixes:
 * ```
 * <root>/
 * └── <plugin-name>/
 *     ├── 1.0.0/
 *     └── 1.2.0/
 * ```
 * `locate` uses first-match across roots: the first root containing the plugin directory
 * decides where it resolves, even if a later root has a newer version. Enumeration instead
 * merges all roots and keeps the highest version per plugin.
 */

import * as path from 'path';
import { readdirSync } from 'fs';
import { createSilentLogger, DepotLogComponent } from '@plugin-depot/core';
import type { Logger } from '@plugin-depot/core';
import { dirExists } from '../files/index.js';
import { compareVersions, isGreaterThan, latestVersion, tryParseVersion } from '../version/index.js';
import type { DepotConfig } from '../config/index.js';
import { PluginError } from './errors.js';
import type { InstalledPlugin, InstalledVersion } from './types.js';

export interface PluginLocatorOptions {
    /** Install prefixes in priority order */
    roots: readonly string[];
    logger?: Logger;
}

export class PluginLocator {
    private readonly roots: readonly string[];
    private readonly logger: Logger;

    constructor(options: PluginLocatorOptions) {
        this.roots = [...options.roots];
        this.logger = (options.logger ?? createSilentLogger()).createChild(DepotLogComponent.PLUGIN);
    }

    getRoots(): string[] {
        return [...this.roots];
    }

    /**
     * First root that contains a `<pluginName>` directory, or null
     */
    findPluginRoot(pluginName: string): string | null {
        assertValidPluginName(pluginName);
        return this.roots.find((root) => dirExists(path.join(root, pluginName))) ?? null;
    }

    /**
     * Resolve the version directory of an installed plugin.
     *
     * With `explicitVersion` the path is only constructed; whether that version exists is
     * the caller's concern. Otherwise the latest valid version directory is chosen.
     *
     * @throws DepotRuntimeError `plugin_not_installed` or `plugin_no_valid_versions`
     */
    locate(pluginName: string, explicitVersion?: string): string {
        const root = this.findPluginRoot(pluginName);
        if (root === null) {
            throw PluginError.notInstalled(pluginName, this.getRoots());
        }

        const pluginDir = path.join(root, pluginName);
        if (explicitVersion !== undefined) {
            return path.join(pluginDir, explicitVersion);
        }

        const versions = this.readVersions(pluginName, root);
        if (versions.length === 0) {
            throw PluginError.noValidVersions(pluginName, root);
        }

        const latest = latestVersion(versions);
        this.logger.debug(`Resolved ${pluginName} to ${latest.dirName}`, { root });
        return path.join(pluginDir, latest.dirName);
    }

    /**
     * Installed versions of a plugin under the root `locate` would use, ascending.
     * Returns an empty list when the plugin is not installed anywhere.
     */
    getInstalledVersions(pluginName: string): InstalledVersion[] {
        const root = this.findPluginRoot(pluginName);
        if (root === null) {
            return [];
        }
        return this.readVersions(pluginName, root).sort(compareVersions);
    }

    /**
     * Every installed plugin across all roots, at its highest version, sorted by name.
     * When two roots hold the same version of a plugin, the earlier root wins.
     * Plugin directories without any valid version, and directories that can't be read, are left out.
     */
    listInstalled(): InstalledPlugin[] {
        const byName = new Map<string, InstalledPlugin>();

        for (const root of this.roots) {
            if (!dirExists(root)) {
                continue;
            }

            const entries = this.readUnlessUnreadable(root, () =>
                readdirSync(root, { withFileTypes: true })
            );

            for (const entry of entries ?? []) {
                if (!entry.isDirectory()) continue;

                const versions = this.readUnlessUnreadable(path.join(root, entry.name), () =>
                    this.readVersions(entry.name, root)
                );
                if (versions === null) continue;
                if (versions.length === 0) {
                    this.logger.debug(`Skipping ${entry.name}: no valid versions`, { root });
                    continue;
                }

                const latest = latestVersion(versions);
                const existing = byName.get(entry.name);
                if (!existing || isGreaterThan(latest, existing.version)) {
                    byName.set(entry.name, {
                        name: entry.name,
                        version: latest,
                        root,
                        path: path.join(root, entry.name, latest.dirName),
                    });
                }
            }
        }

        return [...byName.values()].sort((a, b) =>
            a.name < b.name ? -1 : a.name > b.name ? 1 : 0
        );
    }

    /**
     * Enumeration skips directories it can't list instead of failing across every root
     */
    private readUnlessUnreadable<T>(dirPath: string, read: () => T): T | null {
        try {
            return read();
        } catch (error) {
            const code = (error as NodeJS.ErrnoException).code;
            if (code === undefined) {
                throw error;
            }
            this.logger.debug(`Skipping unreadable directory ${dirPath}`, { code });
            return null;
        }
    }

    /**
     * Subdirectories of <root>/<pluginName> whose names parse as versions.
     * Anything else is skipped; stray directories are expected.
     */
    private readVersions(pluginName: string, root: string): InstalledVersion[] {
        const pluginDir = path.join(root, pluginName);
        const versions: InstalledVersion[] = [];

        for (const entry of readdirSync(pluginDir, { withFileTypes: true })) {
            if (!entry.isDirectory()) continue;

            const version = tryParseVersion(entry.name);
            if (version === null) {
                this.logger.debug(`Ignoring non-version directory ${entry.name}`, {
                    pluginName,
                    root,
                });
                continue;
            }
            versions.push({ ...version, dirName: entry.name });
        }

        return versions;
    }
}

/**
 * Build a locator over the configured plugin roots
 */
export function createPluginLocator(
    config: Pick<DepotConfig, 'pluginRoots'>,
    logger?: Logger
): PluginLocator {
    return new PluginLocator({ roots: config.pluginRoots, logger });
}

function assertValidPluginName(pluginName: string): void {
    if (
        pluginName.trim() === '' ||
        pluginName === '.' ||
        pluginName === '..' ||
        pluginName.includes('/') ||
        pluginName.includes('\\')
    ) {
        throw PluginError.invalidName(pluginName);
    }
}
