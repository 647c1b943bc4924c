// Versions
export * from './version/index.js';

// Plugin location, properties and installation
export * from './plugins/index.js';

// Directory mirroring
export * from './mirror/index.js';

// Configuration
export * from './config/index.js';

// Files and shared data
export * from './files/index.js';

// Downloads
export * from './download/index.js';

// Console output
export { printSuccess, printFailure } from './utils/console.js';

export {
    MANIFEST_FILE,
    PLUGIN_JSON_FILE,
    CONFIG_FILE_NAME,
    DEFAULT_SHARED_ROOTS,
    ENV_SHARED_ROOTS,
    ENV_PLUGIN_ROOTS,
    ENV_LOG_LEVEL,
} from './constants.js';
