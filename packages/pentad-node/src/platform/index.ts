/**
 * Platform adapter exports
 */

export { FileSystemAdapter } from './FileSystemAdapter.js';
export { ProcessExecutorAdapter } from './ProcessExecutorAdapter.js';
