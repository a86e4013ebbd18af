/**
 * Diff Dispatch
 *
 * One entry point over every supported container kind, plus the per-kind
 * wrappers that fill in default identifiers and the default delta.
 */

import { ArgumentError, TypeMismatchError } from '../errors.js';
import { Matrix } from '../matrix.js';
import { positionalIds } from './alignment.js';
import { diffMatrixBy } from './matrix.js';
import { diffDictBy, diffRecordBy } from './record.js';
import { diffSet } from './set.js';
import type {
  Delta,
  DeltaOptions,
  DictDifference,
  Difference,
  DiffKind,
  DiffRecord,
  MatrixDifference,
  MatrixIdentifiers,
  RecordDifference,
  SetDifference,
  VectorDifference,
  VectorIdentifiers,
} from './types.js';
import { diffVectorBy } from './vector.js';

// ─── Classification ──────────────────────────────────────────

/**
 * The container kind of `value`, or undefined when it cannot be diffed.
 */
export function diffKind(value: unknown): DiffKind | undefined {
  if (value instanceof Set) return 'set';
  if (value instanceof Matrix) return 'matrix';
  if (Array.isArray(value)) return 'vector';
  if (value instanceof Map) return 'dict';
  if (isPlainRecord(value)) return 'record';
  return undefined;
}

export function isPlainRecord(value: unknown): value is DiffRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Type name used in mismatch reports. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'bigint') return typeof value;
  return diffKind(value) ?? (typeof value === 'object' ? tagOf(value) : typeof value);
}

/** e.g. `Date` for a date, from the built-in toString tag. */
function tagOf(value: object): string {
  return Object.prototype.toString.call(value).slice('[object '.length, -1);
}

// ─── Default delta ───────────────────────────────────────────

/**
 * `next − prev` for two numbers or two bigints, a nested diff for two
 * structures of the same kind. Anything else is a type mismatch.
 */
export function elementDelta(next: unknown, prev: unknown): Delta {
  if (typeof prev === 'number' && typeof next === 'number') {
    return next - prev;
  }
  if (typeof prev === 'bigint' && typeof next === 'bigint') {
    return next - prev;
  }
  const prevKind = diffKind(prev);
  if (prevKind !== undefined && prevKind === diffKind(next)) {
    return diffValues(prev, next);
  }
  throw new TypeMismatchError(describeType(prev), describeType(next));
}

// ─── Per-kind entry points ───────────────────────────────────

export { diffSet };

export function diffVector<T>(
  a: readonly T[],
  b: readonly T[],
  options?: DeltaOptions<T, Delta>,
): VectorDifference<number, T, Delta>;
export function diffVector<T, I>(
  a: readonly T[],
  b: readonly T[],
  ids: VectorIdentifiers<I>,
  options?: DeltaOptions<T, Delta>,
): VectorDifference<I, T, Delta>;
export function diffVector<T, I>(
  a: readonly T[],
  b: readonly T[],
  idsOrOptions?: VectorIdentifiers<I> | DeltaOptions<T, Delta>,
  maybeOptions?: DeltaOptions<T, Delta>,
): VectorDifference<I | number, T, Delta> {
  if (isVectorIdentifiers(idsOrOptions)) {
    const options: DeltaOptions<T, Delta> = maybeOptions ?? {};
    return diffVectorBy(
      a,
      b,
      idsOrOptions.oldIds,
      idsOrOptions.newIds,
      options.delta ?? elementDelta,
      options.sparse,
    );
  }
  const options: DeltaOptions<T, Delta> = idsOrOptions ?? {};
  return diffVectorBy(
    a,
    b,
    positionalIds(a.length),
    positionalIds(b.length),
    options.delta ?? elementDelta,
    options.sparse,
  );
}

export function diffMatrix<T>(
  a: Matrix<T>,
  b: Matrix<T>,
  options?: DeltaOptions<T, Delta>,
): MatrixDifference<number, number, T, Delta>;
export function diffMatrix<T, R, C>(
  a: Matrix<T>,
  b: Matrix<T>,
  ids: MatrixIdentifiers<R, C>,
  options?: DeltaOptions<T, Delta>,
): MatrixDifference<R, C, T, Delta>;
export function diffMatrix<T, R, C>(
  a: Matrix<T>,
  b: Matrix<T>,
  idsOrOptions?: MatrixIdentifiers<R, C> | DeltaOptions<T, Delta>,
  maybeOptions?: DeltaOptions<T, Delta>,
): MatrixDifference<R | number, C | number, T, Delta> {
  if (isMatrixIdentifiers(idsOrOptions)) {
    const options: DeltaOptions<T, Delta> = maybeOptions ?? {};
    return diffMatrixBy(a, b, idsOrOptions, options.delta ?? elementDelta, options.sparse);
  }
  const options: DeltaOptions<T, Delta> = idsOrOptions ?? {};
  const ids = {
    oldRowIds: positionalIds(a.rows),
    oldColIds: positionalIds(a.cols),
    newRowIds: positionalIds(b.rows),
    newColIds: positionalIds(b.cols),
  };
  return diffMatrixBy(a, b, ids, options.delta ?? elementDelta, options.sparse);
}

export function diffRecord(a: DiffRecord, b: DiffRecord): RecordDifference {
  return diffRecordBy(a, b, elementDelta);
}

export function diffDict<K, V>(a: ReadonlyMap<K, V>, b: ReadonlyMap<K, V>): DictDifference<K, V> {
  return diffDictBy(a, b, elementDelta);
}

// ─── diff ────────────────────────────────────────────────────

/**
 * Compute the difference between an old value `a` and a new value `b`.
 *
 * Both arguments must be the same kind of container. Vectors and matrices
 * accept identifiers that align their elements; without them elements are
 * aligned by position (identifiers 1…n).
 *
 * @example
 * diff(new Set([1, 2, 3]), new Set([2, 3, 4]));
 * // common {2, 3}, added {4}, removed {1}
 */
export function diff<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): SetDifference<T>;
export function diff<T>(
  a: Matrix<T>,
  b: Matrix<T>,
  options?: DeltaOptions<T, Delta>,
): MatrixDifference<number, number, T, Delta>;
export function diff<T, R, C>(
  a: Matrix<T>,
  b: Matrix<T>,
  ids: MatrixIdentifiers<R, C>,
  options?: DeltaOptions<T, Delta>,
): MatrixDifference<R, C, T, Delta>;
export function diff<T>(
  a: readonly T[],
  b: readonly T[],
  options?: DeltaOptions<T, Delta>,
): VectorDifference<number, T, Delta>;
export function diff<T, I>(
  a: readonly T[],
  b: readonly T[],
  ids: VectorIdentifiers<I>,
  options?: DeltaOptions<T, Delta>,
): VectorDifference<I, T, Delta>;
export function diff<K, V>(a: ReadonlyMap<K, V>, b: ReadonlyMap<K, V>): DictDifference<K, V>;
export function diff(a: DiffRecord, b: DiffRecord): RecordDifference;
export function diff(
  a: unknown,
  b: unknown,
  idsOrOptions?: DiffArgument,
  maybeOptions?: DeltaOptions<unknown, Delta>,
): Difference {
  const kind = checkKinds(a, b);
  const options = optionsFrom(idsOrOptions, maybeOptions);

  if (a instanceof Matrix && b instanceof Matrix) {
    if (isMatrixIdentifiers(idsOrOptions)) {
      return diffMatrix(a, b, idsOrOptions, options);
    }
    if (isVectorIdentifiers(idsOrOptions)) {
      throw new ArgumentError(
        'Matrix identifiers must be given as { oldRowIds, oldColIds, newRowIds, newColIds }',
      );
    }
    return diffMatrix<unknown>(a, b, options);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    if (isVectorIdentifiers(idsOrOptions)) {
      return diffVector(a, b, idsOrOptions, options);
    }
    if (isMatrixIdentifiers(idsOrOptions)) {
      throw new ArgumentError('Vector identifiers must be given as { oldIds, newIds }');
    }
    return diffVector<unknown>(a, b, options);
  }
  if (idsOrOptions !== undefined || maybeOptions !== undefined) {
    throw new ArgumentError(`A ${kind} diff takes no identifiers or options`);
  }
  return diffValues(a, b);
}

type DiffArgument =
  | VectorIdentifiers<unknown>
  | MatrixIdentifiers<unknown, unknown>
  | DeltaOptions<unknown, Delta>;

/**
 * Diff two values of the same kind with default identifiers and delta.
 * Used for nested values, whose type is only known at run time.
 */
export function diffValues(a: unknown, b: unknown): Difference {
  checkKinds(a, b);
  if (a instanceof Set && b instanceof Set) return diffSet<unknown>(a, b);
  if (a instanceof Matrix && b instanceof Matrix) return diffMatrix<unknown>(a, b);
  if (Array.isArray(a) && Array.isArray(b)) return diffVector<unknown>(a, b);
  if (a instanceof Map && b instanceof Map) return diffDict<unknown, unknown>(a, b);
  if (isPlainRecord(a) && isPlainRecord(b)) return diffRecord(a, b);
  throw new ArgumentError(`Cannot diff ${describeType(a)} against ${describeType(b)}`);
}

function checkKinds(a: unknown, b: unknown): DiffKind {
  const kindA = diffKind(a);
  const kindB = diffKind(b);
  if (kindA === undefined || kindB === undefined) {
    const unsupported = kindA === undefined ? a : b;
    throw new ArgumentError(`Cannot diff values of type ${describeType(unsupported)}`);
  }
  if (kindA !== kindB) {
    throw new ArgumentError(`Cannot diff ${kindA} against ${kindB}`);
  }
  return kindA;
}

// ─── Argument guards ─────────────────────────────────────────

const IDENTIFIER_KEYS = ['oldIds', 'newIds', 'oldRowIds', 'oldColIds', 'newRowIds', 'newColIds'];

function isVectorIdentifiers(value: unknown): value is VectorIdentifiers<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'oldIds' in value &&
    'newIds' in value &&
    Array.isArray(value.oldIds) &&
    Array.isArray(value.newIds)
  );
}

function isMatrixIdentifiers(value: unknown): value is MatrixIdentifiers<unknown, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'oldRowIds' in value &&
    'oldColIds' in value &&
    'newRowIds' in value &&
    'newColIds' in value &&
    Array.isArray(value.oldRowIds) &&
    Array.isArray(value.oldColIds) &&
    Array.isArray(value.newRowIds) &&
    Array.isArray(value.newColIds)
  );
}

/**
 * The options argument, wherever it was passed. An argument that names
 * identifiers without forming a complete set of them is rejected.
 */
function optionsFrom(
  idsOrOptions: DiffArgument | undefined,
  maybeOptions: DeltaOptions<unknown, Delta> | undefined,
): DeltaOptions<unknown, Delta> | undefined {
  if (
    idsOrOptions === undefined ||
    isVectorIdentifiers(idsOrOptions) ||
    isMatrixIdentifiers(idsOrOptions)
  ) {
    return maybeOptions;
  }
  const stray = IDENTIFIER_KEYS.filter((key) => key in idsOrOptions);
  if (stray.length > 0) {
    throw new ArgumentError(`Incomplete identifiers: got only ${stray.join(', ')}`);
  }
  return idsOrOptions;
}
