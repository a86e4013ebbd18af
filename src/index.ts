/**
 * structdiff — structural differences between container versions
 *
 * Public API for programmatic usage.
 */

// Diff
export * from './diff/index.js';

// Matrix
export { Matrix } from './matrix.js';

// Errors
export type { DiffErrorCode, PathSegment } from './errors.js';
export {
  DiffError,
  ArgumentError,
  TypeMismatchError,
  withSegment,
  formatPath,
} from './errors.js';

// Config
export type { StructdiffConfig, DisplayConfig } from './config.js';
export {
  ConfigSchema,
  loadConfig,
  loadConfigFile,
  saveConfig,
  defaultConfig,
  findConfigPath,
  localConfigDir,
  localConfigPath,
  STRUCTDIFF_DIR,
} from './config.js';
