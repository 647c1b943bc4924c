export {
    parseVersion,
    tryParseVersion,
    formatVersion,
    compareVersions,
    isGreaterThan,
    versionsEqual,
    latestVersion,
} from './version.js';
export type { Version } from './version.js';
export { VersionError } from './errors.js';
export { VersionErrorCode } from './error-codes.js';
