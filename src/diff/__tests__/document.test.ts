import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { ArgumentError } from '../../errors.js';
import { Matrix } from '../../matrix.js';
import { diffDocuments, documentMap, documentMatrix, fromJson, parseDocument } from '../document.js';
import type { DiffDocument } from '../document.js';
import { DenseVector, SparseVector } from '../values.js';

describe('parseDocument', () => {
  it('accepts each document kind', () => {
    expect(parseDocument({ kind: 'set', values: [1, 'a'] }).kind).toBe('set');
    expect(parseDocument({ kind: 'vector', values: [1], ids: ['x'] }).kind).toBe('vector');
    expect(parseDocument({ kind: 'matrix', rows: [[1]] }).kind).toBe('matrix');
    expect(parseDocument({ kind: 'record', fields: { a: { b: [1] } } }).kind).toBe('record');
    expect(parseDocument({ kind: 'dict', entries: [['k', 1]] }).kind).toBe('dict');
  });

  it('rejects unknown kinds and malformed fields', () => {
    expect(() => parseDocument({ kind: 'tree' })).toThrow(ZodError);
    expect(() => parseDocument({ kind: 'vector', values: 3 })).toThrow(ZodError);
    expect(() => parseDocument({ kind: 'vector', values: [], ids: [true] })).toThrow(ZodError);
  });

  it('accepts only scalar set members', () => {
    expect(() => parseDocument({ kind: 'set', values: [[1, 2], { a: 1 }] })).toThrow(ZodError);
    expect(parseDocument({ kind: 'set', values: ['a', 1, true, null] }).kind).toBe('set');
  });
});

describe('fromJson', () => {
  it('keeps arrays and objects as vectors and records', () => {
    expect(fromJson({ a: [1, { b: null }] })).toEqual({ a: [1, { b: null }] });
  });
});

describe('documentMatrix', () => {
  it('builds a matrix from rows', () => {
    const m = documentMatrix({ kind: 'matrix', rows: [[1, 2], [3, 4]] });

    expect(m).toBeInstanceOf(Matrix);
    expect(m.get(1, 0)).toBe(3);
  });
});

describe('documentMap', () => {
  it('rejects structured and duplicate keys', () => {
    expect(() => documentMap({ kind: 'dict', entries: [[[1], 1]] })).toThrow(
      new ArgumentError('Dictionary keys must be scalars, got [1]'),
    );
    expect(() =>
      documentMap({
        kind: 'dict',
        entries: [
          ['k', 1],
          ['k', 2],
        ],
      }),
    ).toThrow('Dictionary contains duplicate key "k"');
  });
});

describe('diffDocuments', () => {
  it('diffs set documents', () => {
    const d = diffDocuments({ kind: 'set', values: [1, 2] }, { kind: 'set', values: [2, 3] });

    expect(d.kind === 'set' && [...d.added]).toEqual([3]);
  });

  it('finds every member in common when a set document is diffed with itself', () => {
    const doc: DiffDocument = { kind: 'set', values: ['x', 1, null] };
    const d = diffDocuments(doc, doc);

    expect(d.kind).toBe('set');
    if (d.kind === 'set') {
      expect([...d.common]).toEqual(['x', 1, null]);
      expect(d.added.size).toBe(0);
      expect(d.removed.size).toBe(0);
    }
  });

  it('diffs vector documents with identifiers', () => {
    const d = diffDocuments(
      { kind: 'vector', values: [10, 20], ids: ['a', 'b'] },
      { kind: 'vector', values: [25, 5], ids: ['b', 'c'] },
    );

    expect(d.kind).toBe('vector');
    if (d.kind === 'vector') {
      expect(d.modifiedIndices).toEqual(['b']);
      expect(d.modifiedValues.toArray()).toEqual([5]);
      expect(d.addedValues).toEqual([5]);
      expect(d.removedValues).toEqual([10]);
    }
  });

  it('passes the sparse option through', () => {
    const prev: DiffDocument = { kind: 'vector', values: [1, 2] };
    const next: DiffDocument = { kind: 'vector', values: [1, 3] };

    const sparse = diffDocuments(prev, next);
    const dense = diffDocuments(prev, next, { sparse: false });

    expect(sparse.kind === 'vector' && sparse.modifiedValues).toBeInstanceOf(SparseVector);
    expect(dense.kind === 'vector' && dense.modifiedValues).toBeInstanceOf(DenseVector);
  });

  it('fills positional identifiers for a matrix axis left out', () => {
    const d = diffDocuments(
      { kind: 'matrix', rows: [[1, 2]], rowIds: ['r'] },
      { kind: 'matrix', rows: [[1, 2], [3, 4]], rowIds: ['r', 's'] },
    );

    expect(d.kind === 'matrix' && d.modifiedIndices).toEqual([['r'], [1, 2]]);
    expect(d.kind === 'matrix' && d.addedIndices).toEqual([['s'], []]);
  });

  it('diffs record documents recursively', () => {
    const d = diffDocuments(
      { kind: 'record', fields: { n: 1, list: [1, 2] } },
      { kind: 'record', fields: { n: 4, list: [1] } },
    );

    expect(d.kind).toBe('record');
    if (d.kind === 'record') {
      expect(d.modified.n).toBe(3);
      const list = d.modified.list;
      expect(typeof list === 'object' && list.kind === 'vector' && list.removedValues).toEqual([2]);
    }
  });

  it('diffs dict documents', () => {
    const d = diffDocuments(
      { kind: 'dict', entries: [[1, 1]] },
      { kind: 'dict', entries: [[1, 3], [2, 0]] },
    );

    expect(d.kind === 'dict' && [...d.modified]).toEqual([[1, 2]]);
  });

  it('requires identifiers on both sides or neither', () => {
    expect(() =>
      diffDocuments({ kind: 'vector', values: [1], ids: ['a'] }, { kind: 'vector', values: [1] }),
    ).toThrow(new ArgumentError('"ids" must be given for both documents or for neither'));
  });

  it('rejects documents of different kinds', () => {
    expect(() =>
      diffDocuments({ kind: 'set', values: [] }, { kind: 'vector', values: [] }),
    ).toThrow(new ArgumentError('Cannot diff set against vector'));
  });
});
