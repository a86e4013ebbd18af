/**
 * Record Diff
 *
 * Field names are aligned the way vector identifiers are, over a symbolic
 * domain. Fields on both sides get a delta; fields on one side are copied.
 */

import { withSegment } from '../errors.js';
import { alignIdentifiers } from './alignment.js';
import type { Delta, DeltaFn, DictDifference, DiffRecord, RecordDifference } from './types.js';
import { sealDifference } from './types.js';

/**
 * Diff two plain objects over their own enumerable string keys. Iteration
 * follows property order (integer-like keys first, then insertion order).
 */
export function diffRecordBy(
  a: DiffRecord,
  b: DiffRecord,
  delta: DeltaFn<unknown, Delta>,
): RecordDifference {
  const names = alignIdentifiers(Object.keys(a), Object.keys(b), { old: 'old record', new: 'new record' });

  const modified = Object.fromEntries(
    names.modified.map((name) => [name, withSegment(name, () => delta(b[name], a[name]))]),
  );

  const result: RecordDifference = {
    kind: 'record',
    modified: Object.freeze(modified),
    added: Object.freeze(Object.fromEntries(names.added.map((name) => [name, b[name]]))),
    removed: Object.freeze(Object.fromEntries(names.removed.map((name) => [name, a[name]]))),
  };
  return sealDifference(result);
}

/**
 * Diff two maps over their keys. Keys compare with SameValueZero.
 */
export function diffDictBy<K, V>(
  a: ReadonlyMap<K, V>,
  b: ReadonlyMap<K, V>,
  delta: DeltaFn<V, Delta>,
): DictDifference<K, V> {
  const incoming = new Map<K, readonly [V]>();
  for (const [key, next] of b) {
    incoming.set(key, [next]);
  }

  const modified = new Map<K, Delta>();
  const removed = new Map<K, V>();
  for (const [key, prev] of a) {
    const next = incoming.get(key);
    if (next) {
      modified.set(key, withSegment(key, () => delta(next[0], prev)));
    } else {
      removed.set(key, prev);
    }
  }

  const added = new Map<K, V>();
  for (const [key, next] of b) {
    if (!a.has(key)) {
      added.set(key, next);
    }
  }

  const result: DictDifference<K, V> = { kind: 'dict', modified, added, removed };
  return sealDifference(result);
}
