/**
 * Value vectors: storage for the modified-values slice of indexed diffs.
 *
 * Unchanged regions produce runs of zero deltas, so numeric deltas are kept
 * sparse when there is anything to elide. Both layouts read the same.
 */

export interface ValueVector<T> extends Iterable<T> {
  readonly length: number;
  get(index: number): T;
  toArray(): T[];
}

export class DenseVector<T> implements ValueVector<T> {
  private readonly values: readonly T[];

  constructor(values: readonly T[]) {
    this.values = Object.freeze([...values]);
  }

  get length(): number {
    return this.values.length;
  }

  get(index: number): T {
    checkBounds(index, this.values.length);
    return this.values[index];
  }

  toArray(): T[] {
    return [...this.values];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values[Symbol.iterator]();
  }
}

export class SparseVector<T> implements ValueVector<T> {
  readonly length: number;
  /** Value reported for every position without a stored entry. */
  readonly fill: T;
  private readonly cells: ReadonlyMap<number, readonly [T]>;

  constructor(length: number, fill: T, entries: Iterable<readonly [number, T]> = []) {
    this.length = length;
    this.fill = fill;
    const cells = new Map<number, readonly [T]>();
    for (const [index, value] of entries) {
      checkBounds(index, length);
      if (!Object.is(value, fill)) {
        cells.set(index, [value]);
      }
    }
    this.cells = cells;
  }

  static fromDense<T>(values: readonly T[], fill: T): SparseVector<T> {
    return new SparseVector(
      values.length,
      fill,
      values.map((value, index) => [index, value] as const),
    );
  }

  /** Number of explicitly stored (non-fill) entries. */
  get stored(): number {
    return this.cells.size;
  }

  get(index: number): T {
    checkBounds(index, this.length);
    const cell = this.cells.get(index);
    return cell ? cell[0] : this.fill;
  }

  /** Stored entries in ascending position order. */
  entries(): Array<[number, T]> {
    return [...this.cells.entries()]
      .map(([index, [value]]): [number, T] => [index, value])
      .sort(([a], [b]) => a - b);
  }

  toArray(): T[] {
    return Array.from({ length: this.length }, (_, index) => this.get(index));
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let index = 0; index < this.length; index++) {
      yield this.get(index);
    }
  }
}

/**
 * Pick a layout for a slice of deltas. Sparse only pays off for numeric
 * deltas containing at least one zero.
 */
export function toValueVector<T>(values: readonly T[], sparse: boolean): ValueVector<T> {
  if (!sparse || !values.every(isNumeric)) {
    return new DenseVector(values);
  }
  const zero = values.find(isZero);
  if (zero === undefined) {
    return new DenseVector(values);
  }
  return SparseVector.fromDense(values, zero);
}

function isNumeric(value: unknown): boolean {
  return typeof value === 'number' || typeof value === 'bigint';
}

function isZero(value: unknown): boolean {
  return Object.is(value, 0) || value === 0n;
}

function checkBounds(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new RangeError(`Index ${index} is outside a vector of length ${length}`);
  }
}
