import * as path from 'path';
import { readdirSync } from 'fs';

/**
 * Generic directory walker that searches up the directory tree
 * @param startPath Starting directory path
 * @param predicate Function that returns true when the desired condition is found
 * @returns The directory path where the condition was met, or null if not found
 */
export function walkUpDirectories(
    startPath: string,
    predicate: (dirPath: string) => boolean
): string | null {
    let currentPath = path.resolve(startPath);
    const rootPath = path.parse(currentPath).root;

    while (true) {
        if (predicate(currentPath)) {
            return currentPath;
        }
        if (currentPath === rootPath) break;
        const parent = path.dirname(currentPath);
        if (parent === currentPath) break; // safety for exotic paths
        currentPath = parent;
    }

    return null;
}

export interface FindFilesOptions {
    /** Keep a regular file when this returns true (default: keep all) */
    include?: (filePath: string) => boolean;
    /** Skip a directory and everything below it when this returns true */
    prune?: (dirPath: string) => boolean;
}

/**
 * Collect regular files below `rootDir`, walking entries in lexical order.
 * The root itself is never pruned.
 * @returns Absolute paths of matching files
 */
export function findFiles(rootDir: string, options: FindFilesOptions = {}): string[] {
    const { include = () => true, prune = () => false } = options;
    const found: string[] = [];

    const visit = (dir: string): void => {
        const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
            a.name < b.name ? -1 : a.name > b.name ? 1 : 0
        );

        for (const entry of entries) {
            const entryPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!prune(entryPath)) {
                    visit(entryPath);
                }
            } else if (entry.isFile() && include(entryPath)) {
                found.push(entryPath);
            }
        }
    };

    visit(path.resolve(rootDir));
    return found;
}
