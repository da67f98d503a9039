/**
 * Bidirectional mapping between vector indices and feature identities
 */

import { StructuralError } from "./errors.js";
import type { FeatureIdentity, IdentityToIndex, IndexToIdentity } from "./types.js";

/**
 * Unambiguous string key for a feature identity.
 * Distinct (name, term) pairs never share a key, whatever characters they contain.
 */
export function identityKey(identity: FeatureIdentity): string {
  return JSON.stringify([identity.name, identity.term]);
}

/**
 * Exact equality of two feature identities
 */
export function identityEquals(a: FeatureIdentity, b: FeatureIdentity): boolean {
  return a.name === b.name && a.term === b.term;
}

/**
 * Render an identity for messages and CLI output
 */
export function formatIdentity(identity: FeatureIdentity): string {
  return `(${identity.name}, ${identity.term})`;
}

/**
 * Immutable bijection between mapped indices in [0, dimension) and feature identities.
 * Indices without a feature are allowed; they resolve to `undefined`.
 */
export class FeatureIndexMap implements IndexToIdentity, IdentityToIndex {
  readonly dimension: number;
  #byIndex: Map<number, FeatureIdentity>;
  #byKey: Map<string, number>;

  private constructor(entries: Iterable<[number, FeatureIdentity]>, dimension?: number) {
    this.#byIndex = new Map();
    this.#byKey = new Map();

    let maxIndex = -1;
    for (const [index, identity] of entries) {
      if (!Number.isInteger(index) || index < 0) {
        throw new StructuralError(`Feature index must be a non-negative integer, got: ${index}`);
      }
      if (typeof identity?.name !== "string" || typeof identity.term !== "string") {
        throw new StructuralError(`Feature at index ${index} must have string name and term`);
      }
      if (this.#byIndex.has(index)) {
        throw new StructuralError(`Feature index ${index} is mapped more than once`);
      }

      const key = identityKey(identity);
      const existing = this.#byKey.get(key);
      if (existing !== undefined) {
        throw new StructuralError(
          `Feature ${formatIdentity(identity)} is mapped to both index ${existing} and ${index}`
        );
      }

      this.#byIndex.set(index, { name: identity.name, term: identity.term });
      this.#byKey.set(key, index);
      maxIndex = Math.max(maxIndex, index);
    }

    if (dimension === undefined) {
      this.dimension = maxIndex + 1;
    } else {
      if (!Number.isInteger(dimension) || dimension < 0) {
        throw new StructuralError(`Dimension must be a non-negative integer, got: ${dimension}`);
      }
      if (dimension <= maxIndex) {
        throw new StructuralError(
          `Dimension ${dimension} is too small for feature index ${maxIndex}`
        );
      }
      this.dimension = dimension;
    }
  }

  /**
   * Build a map where each identity's index is its position in the list
   */
  static fromIdentities(identities: Iterable<FeatureIdentity>): FeatureIndexMap {
    const entries: [number, FeatureIdentity][] = [];
    let index = 0;
    for (const identity of identities) {
      entries.push([index++, identity]);
    }
    return new FeatureIndexMap(entries, index);
  }

  /**
   * Build a (possibly partial) map from explicit index/identity pairs
   * @param dimension - Domain size; defaults to the largest index + 1
   */
  static fromEntries(
    entries: Iterable<[number, FeatureIdentity]>,
    dimension?: number
  ): FeatureIndexMap {
    return new FeatureIndexMap(entries, dimension);
  }

  /**
   * Number of mapped indices
   */
  get size(): number {
    return this.#byIndex.size;
  }

  identityAt(index: number): FeatureIdentity | undefined {
    return this.#byIndex.get(index);
  }

  indexOf(identity: FeatureIdentity): number | undefined {
    return this.#byKey.get(identityKey(identity));
  }

  has(identity: FeatureIdentity): boolean {
    return this.#byKey.has(identityKey(identity));
  }

  /**
   * Mapped `[index, identity]` pairs in ascending index order
   */
  entries(): [number, FeatureIdentity][] {
    return [...this.#byIndex.entries()].sort((a, b) => a[0] - b[0]);
  }
}
