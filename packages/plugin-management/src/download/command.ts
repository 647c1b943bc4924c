import { spawn, spawnSync } from 'child_process';
import { DownloadError } from './errors.js';

export interface ExecutableCommand {
    command: string;
    args: string[];
}

/**
 * Split a command line on single spaces. No quoting is understood, so arguments
 * containing spaces must be passed as an {@link ExecutableCommand} directly.
 */
export function parseExecutableCommand(commandLine: string): ExecutableCommand {
    const [command, ...args] = commandLine.split(' ');
    if (command === undefined || command === '') {
        throw DownloadError.invalidCommand(commandLine);
    }
    return { command, args };
}

/**
 * Whether `command --version` starts and exits cleanly
 */
export function canRun(command: string): boolean {
    const result = spawnSync(command, ['--version'], {
        stdio: 'ignore',
        shell: process.platform === 'win32',
    });

    if (result.error) {
        return false;
    }

    return result.status === 0;
}

/**
 * Run a command with inherited stdio and resolve with its exit code.
 * Rejects when the process can't be started.
 */
export function runCommand({ command, args }: ExecutableCommand): Promise<number> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio: 'inherit' });

        child.on('close', (code) => {
            // Killed by a signal
            resolve(code ?? 1);
        });

        child.on('error', reject);
    });
}
