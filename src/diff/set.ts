/**
 * Set Diff
 *
 * Membership is the only signal: no identifiers, no positions.
 */

import type { SetDifference } from './types.js';
import { sealDifference } from './types.js';

export function diffSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): SetDifference<T> {
  const result: SetDifference<T> = {
    kind: 'set',
    common: intersect(a, b),
    added: subtract(b, a),
    removed: subtract(a, b),
  };
  return sealDifference(result);
}

/**
 * a ∩ b, walking the smaller set (`a` on ties) and keeping its order.
 */
function intersect<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  return new Set([...small].filter((value) => large.has(value)));
}

/** left − right, in the order of `left`. */
function subtract<T>(left: ReadonlySet<T>, right: ReadonlySet<T>): Set<T> {
  const result = new Set(left);
  for (const value of right) {
    result.delete(value);
  }
  return result;
}
