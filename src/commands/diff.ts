/**
 * structdiff diff <old> <new> — Compare two documents
 *
 * Reads two JSON diff documents, computes their structural difference and
 * prints it as a summary or as JSON.
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import { ZodError } from 'zod';
import { loadConfig, loadConfigFile } from '../config.js';
import { hasChanges } from '../diff/accessors.js';
import { DiffDocumentSchema, diffDocuments } from '../diff/document.js';
import type { DiffDocument } from '../diff/document.js';
import { differenceToJSON, formatDifference } from '../diff/format.js';
import { ArgumentError } from '../errors.js';

export interface DiffOptions {
  json?: boolean;
  /** False when `--no-color` is given */
  color?: boolean;
  maxItems?: string;
  /** Keep modified values dense even when they are numeric */
  dense?: boolean;
  /** Explicit config file instead of the usual lookup */
  config?: string;
}

export async function diffCommand(
  oldPath: string,
  newPath: string,
  options: DiffOptions = {},
): Promise<void> {
  const spinner = ora({ text: 'Loading documents...', isSilent: options.json === true }).start();

  try {
    const config = options.config ? await loadConfigFile(options.config) : await loadConfig();
    const maxItems = options.maxItems === undefined ? config.display.maxItems : parseMaxItems(options.maxItems);

    spinner.text = `Reading ${oldPath}...`;
    const prev = await readDocument(oldPath);
    spinner.text = `Reading ${newPath}...`;
    const next = await readDocument(newPath);

    spinner.text = 'Computing difference...';
    const difference = diffDocuments(prev, next, { sparse: options.dense ? false : config.sparse });
    spinner.succeed('Diff complete');

    if (options.json) {
      console.log(JSON.stringify(differenceToJSON(difference), null, 2));
      return;
    }

    console.log();
    console.log(
      formatDifference(difference, {
        color: options.color !== false && config.display.color,
        maxItems,
      }),
    );
    if (!hasChanges(difference)) {
      console.log(chalk.dim('  No changes.'));
    }
    console.log();
  } catch (err) {
    spinner.fail('Diff failed');
    console.error(chalk.red(`✗ ${errorMessage(err)}`));
    process.exitCode = 1;
  }
}

/**
 * Read and validate one document file.
 */
export async function readDocument(path: string): Promise<DiffDocument> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const result = DiffDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ArgumentError(`${path} is not a valid diff document: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseMaxItems(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ArgumentError(`--max-items must be a positive integer, got "${value}"`);
  }
  return n;
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function errorMessage(err: unknown): string {
  if (err instanceof ZodError) {
    return formatIssues(err);
  }
  return err instanceof Error ? err.message : String(err);
}
