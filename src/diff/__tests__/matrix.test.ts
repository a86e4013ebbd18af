import { describe, expect, it } from 'vitest';
import { ArgumentError, TypeMismatchError } from '../../errors.js';
import { Matrix } from '../../matrix.js';
import { diffMatrix } from '../dispatch.js';
import { DenseVector, SparseVector } from '../values.js';

describe('Matrix', () => {
  it('builds row-major storage from nested rows', () => {
    const m = Matrix.fromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);

    expect(m.rows).toBe(2);
    expect(m.cols).toBe(3);
    expect(m.size).toBe(6);
    expect(m.get(1, 0)).toBe(4);
    expect(m.row(0)).toEqual([1, 2, 3]);
    expect(m.toArray()).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...m]).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('rejects ragged rows', () => {
    expect(() => Matrix.fromRows([[1], [2, 3]])).toThrow(
      new ArgumentError('Row 1 has 2 columns, expected 1'),
    );
  });

  it('rejects data that does not fill the shape', () => {
    expect(() => new Matrix(2, 2, [1, 2, 3])).toThrow(ArgumentError);
  });

  it('an empty list of rows is 0×0', () => {
    const m = Matrix.fromRows<number>([]);

    expect(m.rows).toBe(0);
    expect(m.cols).toBe(0);
    expect(m.toRows()).toEqual([]);
  });

  it('throws RangeError outside its bounds', () => {
    expect(() => Matrix.fromRows([[1]]).get(0, 1)).toThrow(RangeError);
  });
});

describe('diffMatrix', () => {
  const a = Matrix.fromRows([
    [1, 2],
    [3, 4],
  ]);
  const b = Matrix.fromRows([
    [10, 20, 30],
    [40, 50, 60],
  ]);
  const ids = {
    oldRowIds: ['r1', 'r2'],
    oldColIds: ['c1', 'c2'],
    newRowIds: ['r2', 'r3'],
    newColIds: ['c2', 'c3', 'c1'],
  };

  it('aligns rows and columns independently', () => {
    const d = diffMatrix(a, b, ids);

    expect(d.modifiedIndices).toEqual([['r2'], ['c1', 'c2']]);
    expect(d.addedIndices).toEqual([['r3'], ['c3']]);
    expect(d.removedIndices).toEqual([['r1'], []]);
  });

  it('computes deltas over the modified region in row-major order', () => {
    const d = diffMatrix(a, b, ids);

    // (r2, c1): 30 - 3, (r2, c2): 10 - 4
    expect(d.modifiedValues.toArray()).toEqual([27, 6]);
    expect(d.modifiedValues).toBeInstanceOf(DenseVector);
  });

  it('collects cells outside the modified region', () => {
    const d = diffMatrix(a, b, ids);

    expect(d.addedValues).toEqual([20, 40, 50, 60]);
    expect(d.removedValues).toEqual([1, 2]);
  });

  it('aligns by position without identifiers', () => {
    const next = Matrix.fromRows([
      [1, 2],
      [3, 5],
    ]);
    const d = diffMatrix(a, next);

    expect(d.modifiedIndices).toEqual([
      [1, 2],
      [1, 2],
    ]);
    expect(d.modifiedValues).toBeInstanceOf(SparseVector);
    expect(d.modifiedValues.toArray()).toEqual([0, 0, 0, 1]);
    expect(d.addedValues).toEqual([]);
    expect(d.removedValues).toEqual([]);
  });

  it('a grown matrix adds a row and a column', () => {
    const grown = Matrix.fromRows([
      [1, 2, 9],
      [3, 4, 9],
      [9, 9, 9],
    ]);
    const d = diffMatrix(a, grown);

    expect(d.addedIndices).toEqual([[3], [3]]);
    expect(d.addedValues).toEqual([9, 9, 9, 9, 9]);
    expect(d.modifiedValues.toArray()).toEqual([0, 0, 0, 0]);
  });

  it('everything is added when the old matrix is 0×0', () => {
    const d = diffMatrix(Matrix.empty<number>(), Matrix.fromRows([[1, 2]]));

    expect(d.modifiedIndices).toEqual([[], []]);
    expect(d.addedIndices).toEqual([[1], [1, 2]]);
    expect(d.addedValues).toEqual([1, 2]);
    expect(d.removedIndices).toEqual([[], []]);
    expect(d.removedValues).toEqual([]);
  });

  it('everything is removed when the new matrix is 0×0', () => {
    const d = diffMatrix(a, Matrix.empty<number>());

    expect(d.removedIndices).toEqual([
      [1, 2],
      [1, 2],
    ]);
    expect(d.removedValues).toEqual([1, 2, 3, 4]);
    expect(d.addedValues).toEqual([]);
  });

  it('rejects identifiers that do not match the shape', () => {
    expect(() =>
      diffMatrix(a, b, { ...ids, newColIds: ['c1', 'c2'] }),
    ).toThrow(new ArgumentError('newColIds has 2 identifiers for 3 elements'));
  });

  it('reports the cell of an element that cannot be subtracted', () => {
    const prev = Matrix.fromRows<unknown>([['x']]);
    const next = Matrix.fromRows<unknown>([['y']]);

    expect(() => diffMatrix(prev, next)).toThrow(
      new TypeMismatchError('string', 'string', [[1, 1]]),
    );
    expect(() => diffMatrix(prev, next)).toThrow(
      'Values of type string cannot be subtracted or diffed at [1, 1]',
    );
  });

  it('satisfies symmetry', () => {
    const forward = diffMatrix(a, b, ids);
    const backward = diffMatrix(b, a, {
      oldRowIds: ids.newRowIds,
      oldColIds: ids.newColIds,
      newRowIds: ids.oldRowIds,
      newColIds: ids.oldColIds,
    });

    expect(backward.addedIndices).toEqual(forward.removedIndices);
    expect(backward.removedIndices).toEqual(forward.addedIndices);
    expect(backward.addedValues).toEqual(forward.removedValues);
  });
});
