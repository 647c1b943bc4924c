/**
 * Download Collaborator
 *
 * Fetches a single file into an existing directory. The first available tool wins:
 * `wget`, then `curl`, then the runtime's own `fetch`. Nothing is retried and transport
 * errors are not interpreted beyond an exit code or HTTP status.
 */

import * as path from 'path';
import { writeFile } from 'fs/promises';
import { createSilentLogger, DepotLogComponent } from '@plugin-depot/core';
import type { Logger } from '@plugin-depot/core';
import { dirExists } from '../files/index.js';
import { canRun, runCommand } from './command.js';
import type { ExecutableCommand } from './command.js';
import { DownloadError } from './errors.js';

export type DownloadStrategy = 'wget' | 'curl' | 'fetch';

export interface DownloadOptions {
    /** Probe for an external tool (default: `<tool> --version` exits 0) */
    isAvailable?: (tool: 'wget' | 'curl') => boolean;
    /** Runs an external tool, resolving with its exit code */
    runCommand?: (command: ExecutableCommand) => Promise<number>;
    fetch?: typeof fetch;
    logger?: Logger;
}

export interface DownloadResult {
    strategy: DownloadStrategy;
    /** `<targetDir>/<last URL path segment>` */
    filePath: string;
}

export async function download(
    url: string,
    targetDir: string,
    options: DownloadOptions = {}
): Promise<DownloadResult> {
    const logger = (options.logger ?? createSilentLogger()).createChild(DepotLogComponent.DOWNLOAD);
    const isAvailable = options.isAvailable ?? canRun;
    const run = options.runCommand ?? runCommand;

    if (!dirExists(targetDir)) {
        throw DownloadError.targetDirMissing(targetDir);
    }

    const filePath = path.join(targetDir, fileNameFromUrl(url));

    if (isAvailable('wget')) {
        logger.info(`Downloading ${url} with wget`, { targetDir });
        await runTool({ command: 'wget', args: [url, '--directory-prefix', targetDir] }, url, run);
        return { strategy: 'wget', filePath };
    }

    if (isAvailable('curl')) {
        logger.info(`Downloading ${url} with curl`, { targetDir });
        await runTool({ command: 'curl', args: ['-o', filePath, url] }, url, run);
        return { strategy: 'curl', filePath };
    }

    logger.info(`Downloading ${url}`, { targetDir });
    const fetchImpl = options.fetch ?? fetch;
    const response = await fetchImpl(url);
    if (!response.ok) {
        throw DownloadError.httpError(url, response.status, response.statusText);
    }
    await writeFile(filePath, new Uint8Array(await response.arrayBuffer()));
    logger.debug(`Saved ${filePath}`);

    return { strategy: 'fetch', filePath };
}

async function runTool(
    command: ExecutableCommand,
    url: string,
    run: (command: ExecutableCommand) => Promise<number>
): Promise<void> {
    const exitCode = await run(command);
    if (exitCode !== 0) {
        throw DownloadError.commandFailed(command.command, exitCode, url);
    }
}

function fileNameFromUrl(url: string): string {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        throw DownloadError.invalidUrl(url);
    }

    const fileName = path.posix.basename(pathname);
    if (fileName === '') {
        throw DownloadError.invalidUrl(url);
    }
    return fileName;
}
