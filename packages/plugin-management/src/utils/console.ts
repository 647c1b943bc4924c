import chalk from 'chalk';

/**
 * Print each line to stdout in green
 */
export function printSuccess(...lines: string[]): void {
    for (const line of lines) {
        console.log(chalk.green(line));
    }
}

/**
 * Print each line to stdout in red
 */
export function printFailure(...lines: string[]): void {
    for (const line of lines) {
        console.log(chalk.red(line));
    }
}
