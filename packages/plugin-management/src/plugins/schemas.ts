import { z } from 'zod';

/**
 * Plugin properties file (e.g. plugin.json). Only `version` is interpreted here;
 * other fields are passed through untouched.
 */
export const PluginPropertiesSchema = z.record(z.string(), z.unknown());

export const VersionedPluginPropertiesSchema = z
    .object({
        version: z.string({
            required_error: 'missing "version" field',
            invalid_type_error: '"version" must be a string',
        }),
    })
    .passthrough();

export type PluginProperties = z.output<typeof PluginPropertiesSchema>;
