export { download } from './download.js';
export type { DownloadOptions, DownloadResult, DownloadStrategy } from './download.js';
export { parseExecutableCommand, canRun, runCommand } from './command.js';
export type { ExecutableCommand } from './command.js';
export { DownloadError } from './errors.js';
export { DownloadErrorCode } from './error-codes.js';
