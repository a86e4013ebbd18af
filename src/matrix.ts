/**
 * Matrix
 *
 * A dense, immutable, row-major 2-D container. Positions are 0-based;
 * identifiers used for alignment are a separate concern (see diff/alignment).
 */

import { ArgumentError } from './errors.js';

export class Matrix<T> implements Iterable<T> {
  readonly rows: number;
  readonly cols: number;
  private readonly data: readonly T[];

  constructor(rows: number, cols: number, data: readonly T[]) {
    if (!Number.isInteger(rows) || rows < 0 || !Number.isInteger(cols) || cols < 0) {
      throw new ArgumentError(`Invalid matrix shape ${rows}×${cols}`);
    }
    if (data.length !== rows * cols) {
      throw new ArgumentError(
        `Matrix data has ${data.length} cells, expected ${rows * cols} for ${rows}×${cols}`,
      );
    }
    this.rows = rows;
    this.cols = cols;
    this.data = Object.freeze([...data]);
  }

  /**
   * Build a matrix from nested rows. An empty list gives a 0×0 matrix.
   */
  static fromRows<T>(rows: readonly (readonly T[])[]): Matrix<T> {
    if (rows.length === 0) {
      return Matrix.empty<T>();
    }
    const cols = rows[0].length;
    rows.forEach((row, index) => {
      if (row.length !== cols) {
        throw new ArgumentError(`Row ${index} has ${row.length} columns, expected ${cols}`);
      }
    });
    return new Matrix(rows.length, cols, rows.flat());
  }

  static empty<T>(): Matrix<T> {
    return new Matrix<T>(0, 0, []);
  }

  get size(): number {
    return this.data.length;
  }

  get(row: number, col: number): T {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      throw new RangeError(`Position (${row}, ${col}) is outside ${this.rows}×${this.cols}`);
    }
    return this.data[row * this.cols + col];
  }

  row(index: number): T[] {
    if (index < 0 || index >= this.rows) {
      throw new RangeError(`Row ${index} is outside ${this.rows}×${this.cols}`);
    }
    return this.data.slice(index * this.cols, (index + 1) * this.cols);
  }

  toRows(): T[][] {
    return Array.from({ length: this.rows }, (_, index) => this.row(index));
  }

  /** Cells in row-major order. */
  toArray(): T[] {
    return [...this.data];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.data[Symbol.iterator]();
  }
}
