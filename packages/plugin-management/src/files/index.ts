export { fileExists, dirExists, readFileContents, copyFile } from './fs-utils.js';
export { findProjectRoot } from './project-root.js';
export { SharedFiles } from './shared-files.js';
export { SharedFileError } from './errors.js';
export { SharedFileErrorCode } from './error-codes.js';
