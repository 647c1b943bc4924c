/** Marks the root of a test project */
export const MANIFEST_FILE = 'manifest.json';
/** Plugin properties file shipped inside a plugin */
export const PLUGIN_JSON_FILE = 'plugin.json';

export const NEW_DIRECTORY_PERMISSIONS = 0o755;
export const NEW_FILE_PERMISSIONS = 0o644;

export const DEFAULT_SHARED_ROOTS = ['/usr/local/share/plugin-depot', '/usr/share/plugin-depot'] as const;

export const PLUGINS_DIRECTORY_NAME = 'plugins';
export const LANGUAGES_DIRECTORY_NAME = 'languages';
export const SKELETON_DIRECTORY_NAME = 'skel';

export const CONFIG_FILE_NAME = 'plugin-depot.yml';

export const ENV_SHARED_ROOTS = 'PLUGIN_DEPOT_SHARED_ROOTS';
export const ENV_PLUGIN_ROOTS = 'PLUGIN_DEPOT_PLUGIN_ROOTS';
export const ENV_LOG_LEVEL = 'PLUGIN_DEPOT_LOG_LEVEL';
