import * as path from 'path';
import { z } from 'zod';
import { LoggerConfigSchema } from '@plugin-depot/core';
import { DEFAULT_SHARED_ROOTS, PLUGINS_DIRECTORY_NAME } from '../constants.js';

const RootListSchema = z.array(z.string().trim().min(1, 'Root paths must not be empty'));

/**
 * Shape accepted from files, environment and overrides before defaults are applied
 */
export const DepotConfigInputSchema = z
    .object({
        sharedRoots: RootListSchema.optional().describe(
            'Shared-files search path (languages, skeletons, plugins), in priority order'
        ),
        pluginRoots: RootListSchema.optional().describe(
            'Plugin install prefixes, in priority order. Defaults to <sharedRoot>/plugins'
        ),
        logger: LoggerConfigSchema.optional().describe('Logger configuration'),
    })
    .strict();

export type DepotConfigInput = z.input<typeof DepotConfigInputSchema>;

/**
 * Fully-resolved configuration
 */
export const DepotConfigSchema = DepotConfigInputSchema.transform((input) => {
    const sharedRoots = input.sharedRoots ?? [...DEFAULT_SHARED_ROOTS];
    return {
        sharedRoots,
        pluginRoots:
            input.pluginRoots ??
            sharedRoots.map((root) => path.join(root, PLUGINS_DIRECTORY_NAME)),
        logger: input.logger ?? LoggerConfigSchema.parse({}),
    };
});

export type DepotConfig = z.output<typeof DepotConfigSchema>;
