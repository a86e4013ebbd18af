import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import {
  defaultConfig,
  findConfigPath,
  loadConfig,
  loadConfigFile,
  localConfigPath,
  saveConfig,
} from '../config.js';

describe('config', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'structdiff-config-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('defaults to sparse output with 20 items in color', () => {
    expect(defaultConfig()).toEqual({
      version: '0.1.0',
      sparse: true,
      display: { maxItems: 20, color: true },
    });
  });

  it('resolves the local config path under .structdiff/', () => {
    expect(localConfigPath(cwd)).toBe(join(resolve(cwd), '.structdiff', 'config.json'));
  });

  it('saves and loads the local config', async () => {
    const config = { ...defaultConfig(), sparse: false };
    await saveConfig(config, cwd);

    expect(findConfigPath(cwd)).toBe(localConfigPath(cwd));
    expect(await loadConfig(cwd)).toEqual(config);
  });

  it('fills missing keys with defaults', async () => {
    const path = join(cwd, 'partial.json');
    await writeFile(path, JSON.stringify({ display: { color: false } }), 'utf-8');

    expect(await loadConfigFile(path)).toEqual({
      version: '0.1.0',
      sparse: true,
      display: { maxItems: 20, color: false },
    });
  });

  it('rejects invalid values', async () => {
    const path = join(cwd, 'invalid.json');
    await writeFile(path, JSON.stringify({ display: { maxItems: 0 } }), 'utf-8');

    await expect(loadConfigFile(path)).rejects.toBeInstanceOf(ZodError);
  });
});
