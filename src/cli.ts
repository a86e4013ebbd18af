#!/usr/bin/env node

/**
 * structdiff CLI
 *
 * Structural differences between two versions of a set, vector, matrix,
 * record or dictionary.
 *
 * Usage:
 *   structdiff diff <old> <new>       Compare two JSON documents
 *   structdiff config                 View the effective configuration
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { configCommand, diffCommand } from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
  .name('structdiff')
  .description('Structural differences between two versions of a container.')
  .version(version);

// ─── structdiff diff ─────────────────────────────────────────

program
  .command('diff <old> <new>')
  .description('Compare two diff documents')
  .option('--json', 'Output as JSON')
  .option('--no-color', 'Disable colorized output')
  .option('--max-items <n>', 'Longest sequence shown before truncating')
  .option('--dense', 'Keep modified values dense')
  .option('-c, --config <path>', 'Config file to use instead of .structdiff/config.json')
  .action(diffCommand);

// ─── structdiff config ───────────────────────────────────────

program
  .command('config')
  .description('View structdiff configuration')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file to use instead of .structdiff/config.json')
  .action(configCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
