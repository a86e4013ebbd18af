import { describe, expect, it } from 'vitest';
import { diffSet } from '../set.js';

describe('diffSet', () => {
  it('splits membership into common, added and removed', () => {
    const d = diffSet(new Set([1, 2, 3]), new Set([2, 3, 4]));

    expect(d.kind).toBe('set');
    expect(d.common).toEqual(new Set([2, 3]));
    expect(d.added).toEqual(new Set([4]));
    expect(d.removed).toEqual(new Set([1]));
  });

  it('keeps added in new order and removed in old order', () => {
    const d = diffSet(new Set(['z', 'm', 'a', 'k']), new Set(['k', 'q', 'b']));

    expect([...d.added]).toEqual(['q', 'b']);
    expect([...d.removed]).toEqual(['z', 'm', 'a']);
    expect([...d.common]).toEqual(['k']);
  });

  it('is complete: common and removed rebuild the old set, common and added the new one', () => {
    const a = new Set([1, 3, 5, 7, 9]);
    const b = new Set([2, 3, 5, 8]);
    const d = diffSet(a, b);

    expect(new Set([...d.common, ...d.removed])).toEqual(a);
    expect(new Set([...d.common, ...d.added])).toEqual(b);
  });

  it('satisfies symmetry', () => {
    const a = new Set(['p', 'q', 'r']);
    const b = new Set(['q', 's']);

    expect(diffSet(a, b).removed).toEqual(diffSet(b, a).added);
    expect(diffSet(a, b).common).toEqual(diffSet(b, a).common);
  });

  it('a set diffed with itself has nothing added or removed', () => {
    const a = new Set([1, 2]);
    const d = diffSet(a, a);

    expect(d.common).toEqual(a);
    expect(d.added.size).toBe(0);
    expect(d.removed.size).toBe(0);
  });

  it('handles empty sets', () => {
    const d = diffSet(new Set<number>(), new Set([1]));

    expect(d.common.size).toBe(0);
    expect(d.added).toEqual(new Set([1]));
    expect(d.removed.size).toBe(0);
  });

  it('does not share storage with its inputs', () => {
    const a = new Set([1, 2]);
    const d = diffSet(a, new Set<number>());
    a.add(3);

    expect(d.removed).toEqual(new Set([1, 2]));
  });
});
