export { loadDepotConfig, readConfigFile, splitRootList } from './loader.js';
export type { LoadDepotConfigOptions } from './loader.js';
export { DepotConfigSchema, DepotConfigInputSchema } from './schemas.js';
export type { DepotConfig, DepotConfigInput } from './schemas.js';
export { setEnvVariable } from './env.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
