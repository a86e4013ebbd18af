/**
 * Matrix Diff
 *
 * Rows and columns are aligned independently. The modified region is the
 * product of the modified rows and modified columns; every other cell of the
 * new matrix is added and every other cell of the old matrix is removed.
 */

import { withSegment } from '../errors.js';
import type { Matrix } from '../matrix.js';
import { alignIdentifiers, checkIdentifiers, indexPositions, positionsOf } from './alignment.js';
import type { DeltaFn, IndexPair, MatrixDifference } from './types.js';
import { sealDifference } from './types.js';
import { toValueVector } from './values.js';

export function diffMatrixBy<T, R, C, D>(
  a: Matrix<T>,
  b: Matrix<T>,
  ids: {
    oldRowIds: readonly R[];
    oldColIds: readonly C[];
    newRowIds: readonly R[];
    newColIds: readonly C[];
  },
  delta: DeltaFn<T, D>,
  sparse = true,
): MatrixDifference<R, C, T, D> {
  checkIdentifiers(ids.oldRowIds, a.rows, 'oldRowIds');
  checkIdentifiers(ids.oldColIds, a.cols, 'oldColIds');
  checkIdentifiers(ids.newRowIds, b.rows, 'newRowIds');
  checkIdentifiers(ids.newColIds, b.cols, 'newColIds');

  if (isBlank(a) || isBlank(b)) {
    indexPositions(ids.newRowIds, 'newRowIds');
    indexPositions(ids.newColIds, 'newColIds');
    indexPositions(ids.oldRowIds, 'oldRowIds');
    indexPositions(ids.oldColIds, 'oldColIds');
    const result: MatrixDifference<R, C, T, D> = {
      kind: 'matrix',
      modifiedIndices: pair<R, C>([], []),
      addedIndices: pair(ids.newRowIds, ids.newColIds),
      removedIndices: pair(ids.oldRowIds, ids.oldColIds),
      modifiedValues: toValueVector<D>([], sparse),
      addedValues: Object.freeze(b.toArray()),
      removedValues: Object.freeze(a.toArray()),
    };
    return sealDifference(result);
  }

  const rows = alignIdentifiers(ids.oldRowIds, ids.newRowIds, { old: 'oldRowIds', new: 'newRowIds' });
  const cols = alignIdentifiers(ids.oldColIds, ids.newColIds, { old: 'oldColIds', new: 'newColIds' });

  const oldRows = positionsOf(rows.modified, rows.oldPositions);
  const newRows = positionsOf(rows.modified, rows.newPositions);
  const oldCols = positionsOf(cols.modified, cols.oldPositions);
  const newCols = positionsOf(cols.modified, cols.newPositions);

  const deltas: D[] = [];
  rows.modified.forEach((rowId, i) => {
    cols.modified.forEach((colId, j) => {
      deltas.push(
        withSegment([rowId, colId], () =>
          delta(b.get(newRows[i], newCols[j]), a.get(oldRows[i], oldCols[j])),
        ),
      );
    });
  });

  const result: MatrixDifference<R, C, T, D> = {
    kind: 'matrix',
    modifiedIndices: pair(rows.modified, cols.modified),
    addedIndices: pair(rows.added, cols.added),
    removedIndices: pair(rows.removed, cols.removed),
    modifiedValues: toValueVector(deltas, sparse),
    addedValues: Object.freeze(outsideRegion(b, newRows, newCols)),
    removedValues: Object.freeze(outsideRegion(a, oldRows, oldCols)),
  };
  return sealDifference(result);
}

function pair<R, C>(rows: readonly R[], cols: readonly C[]): IndexPair<R, C> {
  const result: IndexPair<R, C> = [Object.freeze([...rows]), Object.freeze([...cols])];
  return Object.freeze(result);
}

/** 0×0: nothing on either dimension to align against. */
function isBlank(matrix: Matrix<unknown>): boolean {
  return matrix.rows === 0 && matrix.cols === 0;
}

/**
 * Cells not covered by `rows × cols`, in row-major order.
 */
function outsideRegion<T>(matrix: Matrix<T>, rows: readonly number[], cols: readonly number[]): T[] {
  const inRows = new Set(rows);
  const inCols = new Set(cols);
  const cells: T[] = [];
  for (let row = 0; row < matrix.rows; row++) {
    for (let col = 0; col < matrix.cols; col++) {
      if (!inRows.has(row) || !inCols.has(col)) {
        cells.push(matrix.get(row, col));
      }
    }
  }
  return cells;
}
