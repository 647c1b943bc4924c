import { readFileSync } from 'fs';
import { isDepotRuntimeError } from '@plugin-depot/core';
import { parseVersion } from '../version/index.js';
import type { Version } from '../version/index.js';
import { PluginPropertiesSchema, VersionedPluginPropertiesSchema } from './schemas.js';
import type { PluginProperties } from './schemas.js';
import { PluginError } from './errors.js';

/**
 * Read a plugin's JSON properties file into a plain record
 *
 * @throws DepotRuntimeError `plugin_properties_read_failed` when the file can't be read,
 *   `plugin_properties_invalid` when it isn't a JSON object
 */
export function readPluginProperties(propertiesPath: string): PluginProperties {
    let content: string;
    try {
        content = readFileSync(propertiesPath, 'utf-8');
    } catch (error) {
        throw PluginError.propertiesReadFailed(
            propertiesPath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw PluginError.propertiesInvalid(
            propertiesPath,
            error instanceof Error ? error.message : String(error)
        );
    }

    const result = PluginPropertiesSchema.safeParse(raw);
    if (!result.success) {
        throw PluginError.propertiesInvalid(propertiesPath, 'expected a JSON object');
    }
    return result.data;
}

/**
 * Version declared in a plugin properties file
 *
 * @throws DepotRuntimeError `plugin_properties_invalid` when `version` is missing or malformed
 */
export function getPluginVersion(propertiesPath: string): Version {
    const properties = readPluginProperties(propertiesPath);

    const result = VersionedPluginPropertiesSchema.safeParse(properties);
    if (!result.success) {
        throw PluginError.propertiesInvalid(
            propertiesPath,
            result.error.issues.map((issue) => issue.message).join('; ')
        );
    }

    try {
        return parseVersion(result.data.version);
    } catch (error) {
        if (isDepotRuntimeError(error)) {
            throw PluginError.propertiesInvalid(propertiesPath, error.message);
        }
        throw error;
    }
}
