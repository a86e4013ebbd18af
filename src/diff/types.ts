/**
 * Difference Value Types
 *
 * Immutable results of a single diff call, one per container kind. Every
 * value carries a `kind` discriminant so callers can switch on it.
 */

import type { ValueVector } from './values.js';

export type DiffKind = 'set' | 'vector' | 'matrix' | 'record' | 'dict';

/** A plain object diffed field by field. */
export type DiffRecord = Readonly<Record<string, unknown>>;

/**
 * The change for an element present on both sides: a numeric difference
 * (`new − old`) or a nested difference value.
 */
export type Delta = number | bigint | Difference;

/** Computes the change between the old and new version of one element. */
export type DeltaFn<T, D> = (next: T, prev: T) => D;

/** Row identifiers paired with column identifiers. */
export type IndexPair<R, C> = readonly [rows: readonly R[], cols: readonly C[]];

export interface SetDifference<T> {
  readonly kind: 'set';
  /** Elements in both sets */
  readonly common: ReadonlySet<T>;
  /** Elements only in the new set */
  readonly added: ReadonlySet<T>;
  /** Elements only in the old set */
  readonly removed: ReadonlySet<T>;
}

export interface VectorDifference<I, T, D = Delta> {
  readonly kind: 'vector';
  readonly modifiedIndices: readonly I[];
  readonly addedIndices: readonly I[];
  readonly removedIndices: readonly I[];
  /** Deltas, aligned with `modifiedIndices` */
  readonly modifiedValues: ValueVector<D>;
  /** New values, aligned with `addedIndices` */
  readonly addedValues: readonly T[];
  /** Old values, aligned with `removedIndices` */
  readonly removedValues: readonly T[];
}

/**
 * Like {@link VectorDifference}, with every index field split into rows and
 * columns. Values are flattened in row-major order: modified values over the
 * modified row × column product, added/removed values over the complement
 * cells of the new/old matrix.
 */
export interface MatrixDifference<R, C, T, D = Delta> {
  readonly kind: 'matrix';
  readonly modifiedIndices: IndexPair<R, C>;
  readonly addedIndices: IndexPair<R, C>;
  readonly removedIndices: IndexPair<R, C>;
  readonly modifiedValues: ValueVector<D>;
  readonly addedValues: readonly T[];
  readonly removedValues: readonly T[];
}

export interface RecordDifference {
  readonly kind: 'record';
  readonly modified: Readonly<Record<string, Delta>>;
  readonly added: DiffRecord;
  readonly removed: DiffRecord;
}

export interface DictDifference<K, V> {
  readonly kind: 'dict';
  readonly modified: ReadonlyMap<K, Delta>;
  readonly added: ReadonlyMap<K, V>;
  readonly removed: ReadonlyMap<K, V>;
}

export type Difference =
  | SetDifference<unknown>
  | VectorDifference<unknown, unknown, unknown>
  | MatrixDifference<unknown, unknown, unknown, unknown>
  | RecordDifference
  | DictDifference<unknown, unknown>;

/** Options shared by the indexed (vector and matrix) diffs. */
export interface IndexedDiffOptions {
  /** Keep zero deltas implicit in `modifiedValues` (default: true) */
  sparse?: boolean;
}

export interface DeltaOptions<T, D> extends IndexedDiffOptions {
  /** Replaces the default `new − old` / recursive delta */
  delta?: DeltaFn<T, D>;
}

export interface VectorIdentifiers<I> {
  oldIds: readonly I[];
  newIds: readonly I[];
}

export interface MatrixIdentifiers<R, C> {
  oldRowIds: readonly R[];
  oldColIds: readonly C[];
  newRowIds: readonly R[];
  newColIds: readonly C[];
}

const differences = new WeakSet<object>();

/**
 * Freeze a freshly built difference and mark it as one. Only marked values
 * pass {@link isDifference}, so user data shaped like a difference stays data.
 */
export function sealDifference<T extends { readonly kind: DiffKind }>(difference: T): T {
  differences.add(Object.freeze(difference));
  return difference;
}

export function isDifference(value: unknown): value is Difference {
  return typeof value === 'object' && value !== null && differences.has(value);
}
