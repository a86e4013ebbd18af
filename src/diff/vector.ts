/**
 * Vector Diff
 *
 * Aligns two sequences by identifier and gathers the values at the modified,
 * added and removed positions. Modified positions carry a delta computed by
 * the supplied function.
 */

import { withSegment } from '../errors.js';
import { alignIdentifiers, checkIdentifiers, indexPositions, positionsOf } from './alignment.js';
import type { DeltaFn, VectorDifference } from './types.js';
import { sealDifference } from './types.js';
import { toValueVector } from './values.js';

export function diffVectorBy<T, I, D>(
  a: readonly T[],
  b: readonly T[],
  oldIds: readonly I[],
  newIds: readonly I[],
  delta: DeltaFn<T, D>,
  sparse = true,
): VectorDifference<I, T, D> {
  checkIdentifiers(oldIds, a.length, 'oldIds');
  checkIdentifiers(newIds, b.length, 'newIds');

  // Nothing to align against: one side is entirely added or removed.
  if (a.length === 0 || b.length === 0) {
    indexPositions(oldIds, 'oldIds');
    indexPositions(newIds, 'newIds');
    const result: VectorDifference<I, T, D> = {
      kind: 'vector',
      modifiedIndices: [],
      addedIndices: Object.freeze([...newIds]),
      removedIndices: Object.freeze([...oldIds]),
      modifiedValues: toValueVector<D>([], sparse),
      addedValues: Object.freeze([...b]),
      removedValues: Object.freeze([...a]),
    };
    return sealDifference(result);
  }

  const alignment = alignIdentifiers(oldIds, newIds);

  const oldModified = positionsOf(alignment.modified, alignment.oldPositions);
  const newModified = positionsOf(alignment.modified, alignment.newPositions);
  const deltas = alignment.modified.map((id, k) =>
    withSegment(id, () => delta(b[newModified[k]], a[oldModified[k]])),
  );

  const addedValues = positionsOf(alignment.added, alignment.newPositions).map((p) => b[p]);
  const removedValues = positionsOf(alignment.removed, alignment.oldPositions).map((p) => a[p]);

  const result: VectorDifference<I, T, D> = {
    kind: 'vector',
    modifiedIndices: Object.freeze(alignment.modified),
    addedIndices: Object.freeze(alignment.added),
    removedIndices: Object.freeze(alignment.removed),
    modifiedValues: toValueVector(deltas, sparse),
    addedValues: Object.freeze(addedValues),
    removedValues: Object.freeze(removedValues),
  };
  return sealDifference(result);
}
