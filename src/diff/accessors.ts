/**
 * Read-only accessors over difference values.
 *
 * These are the contract that display, equality and caller code build on;
 * they never copy or mutate the underlying partitions.
 */

import { isDifference } from './types.js';
import type {
  Delta,
  DictDifference,
  Difference,
  DiffRecord,
  IndexPair,
  MatrixDifference,
  RecordDifference,
  SetDifference,
  VectorDifference,
} from './types.js';
import type { ValueVector } from './values.js';

type IndexedDifference =
  | VectorDifference<unknown, unknown, unknown>
  | MatrixDifference<unknown, unknown, unknown, unknown>;

/**
 * What both sides share: the common elements of a set, or the identifiers
 * (field names, keys) present on both sides of any other kind.
 */
export function common<T>(d: SetDifference<T>): ReadonlySet<T>;
export function common<I, T, D>(d: VectorDifference<I, T, D>): readonly I[];
export function common<R, C, T, D>(d: MatrixDifference<R, C, T, D>): IndexPair<R, C>;
export function common(d: RecordDifference): readonly string[];
export function common<K, V>(d: DictDifference<K, V>): readonly K[];
export function common(d: Difference): unknown {
  switch (d.kind) {
    case 'set':
      return d.common;
    case 'vector':
    case 'matrix':
      return d.modifiedIndices;
    case 'record':
      return Object.keys(d.modified);
    case 'dict':
      return [...d.modified.keys()];
  }
}

/** Elements, values or fields only in the new version. */
export function added<T>(d: SetDifference<T>): ReadonlySet<T>;
export function added<I, T, D>(d: VectorDifference<I, T, D>): readonly T[];
export function added<R, C, T, D>(d: MatrixDifference<R, C, T, D>): readonly T[];
export function added(d: RecordDifference): DiffRecord;
export function added<K, V>(d: DictDifference<K, V>): ReadonlyMap<K, V>;
export function added(d: Difference): unknown {
  switch (d.kind) {
    case 'set':
    case 'record':
    case 'dict':
      return d.added;
    case 'vector':
    case 'matrix':
      return d.addedValues;
  }
}

/** Elements, values or fields only in the old version. */
export function removed<T>(d: SetDifference<T>): ReadonlySet<T>;
export function removed<I, T, D>(d: VectorDifference<I, T, D>): readonly T[];
export function removed<R, C, T, D>(d: MatrixDifference<R, C, T, D>): readonly T[];
export function removed(d: RecordDifference): DiffRecord;
export function removed<K, V>(d: DictDifference<K, V>): ReadonlyMap<K, V>;
export function removed(d: Difference): unknown {
  switch (d.kind) {
    case 'set':
    case 'record':
    case 'dict':
      return d.removed;
    case 'vector':
    case 'matrix':
      return d.removedValues;
  }
}

/** Deltas for everything present on both sides. */
export function modified<I, T, D>(d: VectorDifference<I, T, D>): ValueVector<D>;
export function modified<R, C, T, D>(d: MatrixDifference<R, C, T, D>): ValueVector<D>;
export function modified(d: RecordDifference): Readonly<Record<string, Delta>>;
export function modified<K, V>(d: DictDifference<K, V>): ReadonlyMap<K, Delta>;
export function modified(
  d: IndexedDifference | RecordDifference | DictDifference<unknown, unknown>,
): unknown {
  switch (d.kind) {
    case 'vector':
    case 'matrix':
      return d.modifiedValues;
    case 'record':
    case 'dict':
      return d.modified;
  }
}

export function modifiedIndices<I, T, D>(d: VectorDifference<I, T, D>): readonly I[];
export function modifiedIndices<R, C, T, D>(d: MatrixDifference<R, C, T, D>): IndexPair<R, C>;
export function modifiedIndices(d: IndexedDifference): unknown {
  return d.modifiedIndices;
}

export function addedIndices<I, T, D>(d: VectorDifference<I, T, D>): readonly I[];
export function addedIndices<R, C, T, D>(d: MatrixDifference<R, C, T, D>): IndexPair<R, C>;
export function addedIndices(d: IndexedDifference): unknown {
  return d.addedIndices;
}

export function removedIndices<I, T, D>(d: VectorDifference<I, T, D>): readonly I[];
export function removedIndices<R, C, T, D>(d: MatrixDifference<R, C, T, D>): IndexPair<R, C>;
export function removedIndices(d: IndexedDifference): unknown {
  return d.removedIndices;
}

/** Whether anything was added or removed, or any delta is non-zero. */
export function hasChanges(d: Difference): boolean {
  switch (d.kind) {
    case 'set':
      return d.added.size > 0 || d.removed.size > 0;
    case 'vector':
      return (
        d.addedIndices.length > 0 ||
        d.removedIndices.length > 0 ||
        d.modifiedValues.toArray().some(isChange)
      );
    case 'matrix':
      return (
        d.addedIndices.some((ids) => ids.length > 0) ||
        d.removedIndices.some((ids) => ids.length > 0) ||
        d.modifiedValues.toArray().some(isChange)
      );
    case 'record':
      return (
        Object.keys(d.added).length > 0 ||
        Object.keys(d.removed).length > 0 ||
        Object.values(d.modified).some(isChange)
      );
    case 'dict':
      return d.added.size > 0 || d.removed.size > 0 || [...d.modified.values()].some(isChange);
  }
}

function isChange(delta: unknown): boolean {
  if (typeof delta === 'number') return delta !== 0;
  if (typeof delta === 'bigint') return delta !== 0n;
  if (isDifference(delta)) return hasChanges(delta);
  return true;
}
