import * as path from 'path';
import { walkUpDirectories } from '@plugin-depot/core';
import { MANIFEST_FILE } from '../constants.js';
import { fileExists } from './fs-utils.js';

/**
 * Find the project root: the nearest directory at or above `startDir` holding a manifest.json
 * @returns Absolute project root, or null outside a project
 */
export function findProjectRoot(startDir: string): string | null {
    return walkUpDirectories(startDir, (dir) => fileExists(path.join(dir, MANIFEST_FILE)));
}
