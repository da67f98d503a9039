/**
 * Dense and sparse numeric vectors
 *
 * Both variants expose the same `activeEntries()` capability, so the encoder
 * never branches on the physical representation.
 *
 * Invariants:
 * - Dimension is fixed at construction
 * - Inputs are copied; a vector never aliases caller-owned arrays
 * - Sparse indices are unique, in range and iterated in ascending order
 */

import { StructuralError } from "./errors.js";
import type { NumericVector } from "./types.js";

function assertDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension < 0) {
    throw new StructuralError(`Vector dimension must be a non-negative integer, got: ${dimension}`);
  }
}

/**
 * Vector storing a value for every index
 */
export class DenseVector implements NumericVector {
  readonly kind = "dense";
  #values: Float64Array;

  constructor(values: ArrayLike<number>) {
    this.#values = Float64Array.from(values);
  }

  /**
   * Create an all-zero vector
   */
  static zeros(dimension: number): DenseVector {
    assertDimension(dimension);
    return new DenseVector(new Float64Array(dimension));
  }

  get dimension(): number {
    return this.#values.length;
  }

  get(index: number): number {
    return this.#values[index] ?? 0;
  }

  *activeEntries(): IterableIterator<[number, number]> {
    for (let i = 0; i < this.#values.length; i++) {
      yield [i, this.#values[i] ?? 0];
    }
  }

  toArray(): Float64Array {
    return Float64Array.from(this.#values);
  }
}

/**
 * Vector storing only a subset of indices; the rest are exactly zero.
 * Explicitly stored zeros remain active entries.
 */
export class SparseVector implements NumericVector {
  readonly kind = "sparse";
  readonly dimension: number;
  #indices: Float64Array;
  #values: Float64Array;

  constructor(dimension: number, indices: ArrayLike<number>, values: ArrayLike<number>) {
    assertDimension(dimension);

    if (indices.length !== values.length) {
      throw new StructuralError(
        `Sparse vector has ${indices.length} indices but ${values.length} values`
      );
    }

    const order: number[] = [];
    for (let i = 0; i < indices.length; i++) {
      const index = indices[i] ?? -1;
      if (!Number.isInteger(index) || index < 0 || index >= dimension) {
        throw new StructuralError(
          `Sparse vector index ${indices[i]} is out of range for dimension ${dimension}`
        );
      }
      order.push(i);
    }
    order.sort((a, b) => (indices[a] ?? 0) - (indices[b] ?? 0));

    this.dimension = dimension;
    this.#indices = new Float64Array(order.length);
    this.#values = new Float64Array(order.length);

    for (let k = 0; k < order.length; k++) {
      const source = order[k] ?? 0;
      const index = indices[source] ?? 0;
      if (k > 0 && this.#indices[k - 1] === index) {
        throw new StructuralError(`Sparse vector index ${index} is stored more than once`);
      }
      this.#indices[k] = index;
      this.#values[k] = values[source] ?? 0;
    }
  }

  /**
   * Number of materialized entries
   */
  get activeSize(): number {
    return this.#indices.length;
  }

  get(index: number): number {
    let lo = 0;
    let hi = this.#indices.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const at = this.#indices[mid] ?? 0;
      if (at === index) return this.#values[mid] ?? 0;
      if (at < index) lo = mid + 1;
      else hi = mid - 1;
    }
    return 0;
  }

  *activeEntries(): IterableIterator<[number, number]> {
    for (let k = 0; k < this.#indices.length; k++) {
      yield [this.#indices[k] ?? 0, this.#values[k] ?? 0];
    }
  }

  toArray(): Float64Array {
    const out = new Float64Array(this.dimension);
    for (let k = 0; k < this.#indices.length; k++) {
      out[this.#indices[k] ?? 0] = this.#values[k] ?? 0;
    }
    return out;
  }
}

/**
 * Check that a value implements the vector capability the codec relies on
 */
export function isNumericVector(value: unknown): value is NumericVector {
  if (value === null || typeof value !== "object") return false;
  return (
    "dimension" in value &&
    typeof value.dimension === "number" &&
    "activeEntries" in value &&
    typeof value.activeEntries === "function" &&
    "get" in value &&
    typeof value.get === "function"
  );
}
