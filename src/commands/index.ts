/**
 * Command re-exports
 */

export { diffCommand } from './diff.js';
export { configCommand } from './config.js';
