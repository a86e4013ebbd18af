/**
 * Difference Display
 *
 * Human-readable summaries of difference values, and a JSON-ready rendering
 * for `--json` output. Neither can be read back into a difference.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { Matrix } from '../matrix.js';
import type { Difference } from './types.js';
import { isDifference } from './types.js';

export interface FormatOptions {
  /** Colorize partition labels (default: false) */
  color?: boolean;
  /** Longest sequence shown before truncating (default: 20) */
  maxItems?: number;
}

export const DEFAULT_MAX_ITEMS = 20;

const NAMES: Record<Difference['kind'], string> = {
  set: 'SetDifference',
  vector: 'VectorDifference',
  matrix: 'MatrixDifference',
  record: 'RecordDifference',
  dict: 'DictDifference',
};

/**
 * Multi-line summary, e.g.
 *
 * ```
 * SetDifference with values:
 *  common: {2, 3}
 *  added: {4}
 *  removed: {1}
 * ```
 */
export function formatDifference(d: Difference, options: FormatOptions = {}): string {
  const paint = options.color ? chalk : new Chalk({ level: 0 });
  const show = (value: unknown): string => formatValue(value, options.maxItems ?? DEFAULT_MAX_ITEMS);
  const title = paint.bold(NAMES[d.kind]);

  switch (d.kind) {
    case 'set':
      return [
        `${title} with values:`,
        ` ${label(paint, 'common')}: ${show(d.common)}`,
        ` ${label(paint, 'added')}: ${show(d.added)}`,
        ` ${label(paint, 'removed')}: ${show(d.removed)}`,
      ].join('\n');
    case 'vector':
    case 'matrix': {
      const [common, added, removed] =
        d.kind === 'matrix'
          ? [d.modifiedIndices, d.addedIndices, d.removedIndices].map(
              ([rows, cols]) => `(${show(rows)}, ${show(cols)})`,
            )
          : [d.modifiedIndices, d.addedIndices, d.removedIndices].map(show);
      return [
        `${title} with indices:`,
        ` ${label(paint, 'common')}: ${common}`,
        ` ${label(paint, 'added')}: ${added}`,
        ` ${label(paint, 'removed')}: ${removed}`,
        'and values:',
        ` ${label(paint, 'common')}: ${show(d.modifiedValues.toArray())}`,
        ` ${label(paint, 'added')}: ${show(d.addedValues)}`,
        ` ${label(paint, 'removed')}: ${show(d.removedValues)}`,
      ].join('\n');
    }
    case 'record':
    case 'dict':
      return [
        `${title} with fields:`,
        ` ${label(paint, 'modified')}: ${show(d.modified)}`,
        ` ${label(paint, 'added')}: ${show(d.added)}`,
        ` ${label(paint, 'removed')}: ${show(d.removed)}`,
      ].join('\n');
  }
}

/**
 * Single-line form used for nested differences.
 */
export function formatDifferenceInline(d: Difference, maxItems = DEFAULT_MAX_ITEMS): string {
  const show = (value: unknown): string => formatValue(value, maxItems);
  switch (d.kind) {
    case 'set':
      return `${NAMES.set}(common=${show(d.common)}, added=${show(d.added)}, removed=${show(d.removed)})`;
    case 'vector':
    case 'matrix':
      return `${NAMES[d.kind]}(modified=${show(d.modifiedValues.toArray())}, added=${show(d.addedValues)}, removed=${show(d.removedValues)})`;
    case 'record':
    case 'dict':
      return `${NAMES[d.kind]}(modified=${show(d.modified)}, added=${show(d.added)}, removed=${show(d.removed)})`;
  }
}

/**
 * Plain data for JSON output. Sets and sequences become arrays, dictionaries
 * become `[key, value]` pairs, bigints become strings.
 */
export function differenceToJSON(d: Difference): Record<string, unknown> {
  switch (d.kind) {
    case 'set':
      return {
        kind: d.kind,
        common: toJSONValue(d.common),
        added: toJSONValue(d.added),
        removed: toJSONValue(d.removed),
      };
    case 'vector':
    case 'matrix':
      return {
        kind: d.kind,
        modifiedIndices: toJSONValue(d.modifiedIndices),
        addedIndices: toJSONValue(d.addedIndices),
        removedIndices: toJSONValue(d.removedIndices),
        modifiedValues: toJSONValue(d.modifiedValues.toArray()),
        addedValues: toJSONValue(d.addedValues),
        removedValues: toJSONValue(d.removedValues),
      };
    case 'record':
    case 'dict':
      return {
        kind: d.kind,
        modified: toJSONValue(d.modified),
        added: toJSONValue(d.added),
        removed: toJSONValue(d.removed),
      };
  }
}

function toJSONValue(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object' || value === null) return value;
  if (isDifference(value)) return differenceToJSON(value);
  if (Array.isArray(value)) return value.map(toJSONValue);
  if (value instanceof Matrix) return value.toRows().map((row) => row.map(toJSONValue));
  if (value instanceof Set) return [...value].map(toJSONValue);
  if (value instanceof Map) return [...value].map(([key, entry]) => [toJSONValue(key), toJSONValue(entry)]);
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJSONValue(entry)]));
}

// ─── Value rendering ─────────────────────────────────────────

function label(paint: ChalkInstance, name: 'common' | 'modified' | 'added' | 'removed'): string {
  switch (name) {
    case 'added':
      return paint.green(name);
    case 'removed':
      return paint.red(name);
    default:
      return paint.yellow(name);
  }
}

export function formatValue(value: unknown, maxItems = DEFAULT_MAX_ITEMS): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
    case 'object':
      return value === null ? 'null' : formatObject(value, maxItems);
    default:
      return String(value);
  }
}

function formatObject(value: object, maxItems: number): string {
  const show = (item: unknown): string => formatValue(item, maxItems);
  if (isDifference(value)) {
    return formatDifferenceInline(value, maxItems);
  }
  if (Array.isArray(value)) {
    return `[${truncate(value.map(show), maxItems)}]`;
  }
  if (value instanceof Matrix) {
    return `Matrix ${value.rows}×${value.cols} [${truncate(value.toRows().map(show), maxItems)}]`;
  }
  if (value instanceof Set) {
    return `{${truncate([...value].map(show), maxItems)}}`;
  }
  if (value instanceof Map) {
    return `{${truncate([...value].map(([key, entry]) => `${show(key)} => ${show(entry)}`), maxItems)}}`;
  }
  return `{${truncate(Object.entries(value).map(([key, entry]) => `${key}: ${show(entry)}`), maxItems)}}`;
}

function truncate(items: string[], maxItems: number): string {
  if (items.length <= maxItems) {
    return items.join(', ');
  }
  const hidden = items.length - maxItems;
  return [...items.slice(0, maxItems), `… +${hidden} more`].join(', ');
}
