export * from './errors/index.js';
export * from './logger/index.js';
export { zodToIssues } from './utils/zod-issues.js';
export { walkUpDirectories, findFiles } from './utils/fs-walk.js';
export type { FindFilesOptions } from './utils/fs-walk.js';
