/**
 * structdiff Configuration
 *
 * Reads .structdiff/config.json in the current project directory.
 * Also supports global config at ~/.structdiff/config.json.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { DEFAULT_MAX_ITEMS } from './diff/format.js';

/** Directory name for local structdiff config */
export const STRUCTDIFF_DIR = '.structdiff';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global structdiff home directory */
export const GLOBAL_STRUCTDIFF_DIR = join(homedir(), '.structdiff');

export const CONFIG_VERSION = '0.1.0';

export const DisplayConfigSchema = z.object({
  /** Longest sequence printed before truncating */
  maxItems: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
  color: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION),
  /** Store modified values of numeric vectors and matrices sparsely */
  sparse: z.boolean().default(true),
  display: DisplayConfigSchema.default({}),
});

export type StructdiffConfig = z.infer<typeof ConfigSchema>;
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;

/**
 * Default configuration.
 */
export function defaultConfig(): StructdiffConfig {
  return {
    version: CONFIG_VERSION,
    sparse: true,
    display: {
      maxItems: DEFAULT_MAX_ITEMS,
      color: true,
    },
  };
}

/**
 * Resolve the local .structdiff directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), STRUCTDIFF_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

export function globalConfigPath(): string {
  return join(GLOBAL_STRUCTDIFF_DIR, CONFIG_FILE);
}

/**
 * Path of the config file {@link loadConfig} would read, or undefined when
 * only defaults apply.
 */
export function findConfigPath(cwd?: string): string | undefined {
  return [localConfigPath(cwd), globalConfigPath()].find((configPath) => existsSync(configPath));
}

/**
 * Load config from the local .structdiff/ directory.
 * Falls back to global config, then to defaults.
 */
export async function loadConfig(cwd?: string): Promise<StructdiffConfig> {
  const configPath = findConfigPath(cwd);
  return configPath ? loadConfigFile(configPath) : defaultConfig();
}

/**
 * Load and validate one config file. Missing keys take their defaults;
 * invalid values throw a ZodError.
 */
export async function loadConfigFile(configPath: string): Promise<StructdiffConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return ConfigSchema.parse(JSON.parse(raw));
}

/**
 * Save config to the local .structdiff/ directory.
 */
export async function saveConfig(config: StructdiffConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
