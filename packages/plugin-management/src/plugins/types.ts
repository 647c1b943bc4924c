import type { Version } from '../version/index.js';

/**
 * A version directory found under <root>/<plugin>/
 */
export interface InstalledVersion extends Version {
    /** Directory name as it exists on disk (may carry leading zeros, e.g. `01.2.0`) */
    readonly dirName: string;
}

/**
 * A plugin and the version that enumeration resolved for it
 */
export interface InstalledPlugin {
    name: string;
    version: InstalledVersion;
    /** Install prefix the version was found under */
    root: string;
    /** Absolute path of the version directory: <root>/<name>/<version dir> */
    path: string;
}

/**
 * Request for installing a plugin version from an unpacked source tree
 */
export interface InstallFromDirectoryRequest {
    pluginName: string;
    /** Canonical major.minor.patch of the version being installed */
    version: string;
    /** Unpacked plugin tree to mirror into the version directory */
    sourceDir: string;
}

export interface InstallFromDirectoryResult {
    installPath: string;
    /** Relative paths written by the mirror */
    written: string[];
}
