export { PluginLocator, createPluginLocator } from './locator.js';
export type { PluginLocatorOptions } from './locator.js';
export { readPluginProperties, getPluginVersion } from './properties.js';
export { PluginPropertiesSchema } from './schemas.js';
export type { PluginProperties } from './schemas.js';
export { installPluginFromDirectory } from './install-plugin.js';
export type { InstallPluginDependencies } from './install-plugin.js';
export { PluginError } from './errors.js';
export { PluginErrorCode } from './error-codes.js';
export type {
    InstalledVersion,
    InstalledPlugin,
    InstallFromDirectoryRequest,
    InstallFromDirectoryResult,
} from './types.js';
