export { mirrorDirectory } from './mirror-directory.js';
export type { MirrorOptions, MirrorResult } from './mirror-directory.js';
export { MirrorError } from './errors.js';
export { MirrorErrorCode } from './error-codes.js';
