import * as path from 'path';
import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import { isDepotRuntimeError, parseLogLevel, zodToIssues, ErrorScope } from '@plugin-depot/core';
import {
    CONFIG_FILE_NAME,
    ENV_LOG_LEVEL,
    ENV_PLUGIN_ROOTS,
    ENV_SHARED_ROOTS,
} from '../constants.js';
import { DepotConfigInputSchema, DepotConfigSchema } from './schemas.js';
import type { DepotConfig, DepotConfigInput } from './schemas.js';
import { ConfigError } from './errors.js';

export interface LoadDepotConfigOptions {
    /** Directory relative roots and the default config file are resolved against */
    cwd?: string;
    /** YAML config file (default: <cwd>/plugin-depot.yml). A missing file is skipped. */
    configPath?: string;
    /** Environment to read PLUGIN_DEPOT_* variables from (default: process.env) */
    env?: NodeJS.ProcessEnv;
    /** Highest-precedence values, typically from CLI flags */
    overrides?: DepotConfigInput;
}

/**
 * Load configuration. Precedence, lowest first: defaults, YAML file, environment, overrides.
 *
 * @throws DepotRuntimeError for unreadable files, invalid YAML or schema violations
 */
export async function loadDepotConfig(options: LoadDepotConfigOptions = {}): Promise<DepotConfig> {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const configPath = path.resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);

    const fromFile = await readConfigFile(configPath);
    const fromEnv = readEnvConfig(env);

    const merged: DepotConfigInput = {
        ...fromFile,
        ...fromEnv.roots,
        ...options.overrides,
    };

    const level = options.overrides?.logger?.level ?? fromEnv.logLevel;
    if (level) {
        merged.logger = { ...merged.logger, level };
    }

    const result = DepotConfigSchema.safeParse(merged);
    if (!result.success) {
        throw ConfigError.validationFailed(
            zodToIssues(result.error, 'error', ErrorScope.CONFIG),
            'merged configuration'
        );
    }

    const config = result.data;
    return {
        ...config,
        sharedRoots: config.sharedRoots.map((root) => path.resolve(cwd, root)),
        pluginRoots: config.pluginRoots.map((root) => path.resolve(cwd, root)),
    };
}

/**
 * Read and validate the YAML config file; a missing file yields an empty config
 */
export async function readConfigFile(configPath: string): Promise<DepotConfigInput> {
    let content: string;
    try {
        content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            return {};
        }
        throw ConfigError.fileReadError(
            configPath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (error) {
        throw ConfigError.parseError(
            configPath,
            error instanceof Error ? error.message : String(error)
        );
    }

    // An empty document parses to null
    if (raw === null || raw === undefined) {
        return {};
    }

    const validation = DepotConfigInputSchema.safeParse(raw);
    if (!validation.success) {
        throw ConfigError.validationFailed(zodToIssues(validation.error), configPath);
    }
    return validation.data;
}

interface EnvConfig {
    roots: Pick<DepotConfigInput, 'sharedRoots' | 'pluginRoots'>;
    logLevel: DepotConfig['logger']['level'] | undefined;
}

function readEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
    const roots: EnvConfig['roots'] = {};

    const sharedRoots = splitRootList(env[ENV_SHARED_ROOTS]);
    if (sharedRoots) roots.sharedRoots = sharedRoots;

    const pluginRoots = splitRootList(env[ENV_PLUGIN_ROOTS]);
    if (pluginRoots) roots.pluginRoots = pluginRoots;

    const rawLevel = env[ENV_LOG_LEVEL];
    let logLevel: EnvConfig['logLevel'];
    if (rawLevel && rawLevel.trim() !== '') {
        try {
            logLevel = parseLogLevel(rawLevel);
        } catch (error) {
            if (isDepotRuntimeError(error)) {
                throw ConfigError.validationFailed(
                    [
                        {
                            code: error.code,
                            message: error.message,
                            scope: ErrorScope.CONFIG,
                            type: error.type,
                            severity: 'error',
                            path: [ENV_LOG_LEVEL],
                        },
                    ],
                    'environment'
                );
            }
            throw error;
        }
    }

    return { roots, logLevel };
}

/**
 * Split a `path.delimiter`-separated list, dropping empty entries.
 * Returns undefined when the variable is unset or blank.
 */
export function splitRootList(value: string | undefined): string[] | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    return value
        .split(path.delimiter)
        .map((entry) => entry.trim())
        .filter((entry) => entry !== '');
}
