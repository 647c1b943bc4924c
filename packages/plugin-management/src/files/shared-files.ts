/**
 * Shared-file lookup
 *
 * Language definitions, skeleton files and the plugins directory live under a list of
 * shared roots (e.g. /usr/local/share/plugin-depot). Roots are searched in order and the
 * first hit wins.
 */

import * as path from 'path';
import {
    LANGUAGES_DIRECTORY_NAME,
    PLUGINS_DIRECTORY_NAME,
    SKELETON_DIRECTORY_NAME,
} from '../constants.js';
import { dirExists, fileExists } from './fs-utils.js';
import { SharedFileError } from './errors.js';

export class SharedFiles {
    constructor(private readonly sharedRoots: readonly string[]) {}

    getSearchPaths(): string[] {
        return [...this.sharedRoots];
    }

    /**
     * @throws DepotRuntimeError `shared_language_not_found`
     */
    getLanguageJsonFilePath(language: string): string {
        const found = this.firstExisting((root) =>
            path.join(root, LANGUAGES_DIRECTORY_NAME, `${language}.json`)
        );
        if (!found) {
            throw SharedFileError.languageNotFound(language, this.getSearchPaths());
        }
        return found;
    }

    isSupportedLanguage(language: string): boolean {
        return (
            this.firstExisting((root) =>
                path.join(root, LANGUAGES_DIRECTORY_NAME, `${language}.json`)
            ) !== null
        );
    }

    /**
     * @throws DepotRuntimeError `shared_skeleton_not_found`
     */
    getSkeletonFilePath(filename: string): string {
        const found = this.firstExisting((root) =>
            path.join(root, SKELETON_DIRECTORY_NAME, filename)
        );
        if (!found) {
            throw SharedFileError.skeletonNotFound(filename, this.getSearchPaths());
        }
        return found;
    }

    /**
     * @throws DepotRuntimeError `shared_plugins_dir_not_found`
     */
    getPluginsPath(): string {
        for (const root of this.sharedRoots) {
            const pluginsDir = path.join(root, PLUGINS_DIRECTORY_NAME);
            if (dirExists(pluginsDir)) {
                return pluginsDir;
            }
        }
        throw SharedFileError.pluginsDirNotFound(this.getSearchPaths());
    }

    private firstExisting(candidate: (root: string) => string): string | null {
        for (const root of this.sharedRoots) {
            const filePath = candidate(root);
            if (fileExists(filePath)) {
                return filePath;
            }
        }
        return null;
    }
}
