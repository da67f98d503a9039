/**
 * Core types for coefficient vectors, feature identities and model records
 */

/**
 * Symbolic identity of a feature, independent of its integer index.
 * Two identities are equal iff both `name` and `term` match exactly.
 */
export interface FeatureIdentity {
  readonly name: string;
  readonly term: string;
}

/**
 * One named coefficient: the unit written to and read from a model record
 */
export interface NameTermValue extends FeatureIdentity {
  readonly value: number;
}

/**
 * Fixed-dimension numeric vector over indices 0..dimension-1
 */
export interface NumericVector {
  readonly kind: "dense" | "sparse";
  readonly dimension: number;

  /**
   * Value at an index (0 for indices a sparse vector does not store)
   */
  get(index: number): number;

  /**
   * Lazily yield the stored `[index, value]` pairs in ascending index order.
   * Dense vectors yield every index; sparse vectors only materialized ones.
   */
  activeEntries(): IterableIterator<[number, number]>;

  /**
   * Fresh dense copy of the vector
   */
  toArray(): Float64Array;
}

/**
 * Model coefficients: mandatory means and optional variances of the same dimension
 */
export interface Coefficients {
  readonly means: NumericVector;
  readonly variances?: NumericVector;
}

/**
 * Resolves a vector index to the feature stored at it (used when encoding)
 */
export interface IndexToIdentity {
  identityAt(index: number): FeatureIdentity | undefined;
}

/**
 * Resolves a feature to its vector index (used when decoding)
 */
export interface IdentityToIndex {
  readonly dimension: number;
  indexOf(identity: FeatureIdentity): number | undefined;
}

/**
 * Persisted, index-independent form of a model
 *
 * `variances` is optional: absent (no variance vector) and `[]` (a variance
 * vector with nothing above the threshold) are different records.
 */
export interface ModelRecord {
  modelId: string;
  lossFunction?: string;
  means: NameTermValue[];
  variances?: NameTermValue[];
}

/**
 * Options for encoding
 */
export interface EncodeOptions {
  /** Entries with |value| <= threshold are dropped (default: LOW_PRECISION_TOLERANCE_THRESHOLD) */
  threshold?: number;
}

/**
 * Options for building a full model record
 */
export interface EncodeModelOptions extends EncodeOptions {
  /** Loss function name stored with the record (default: "") */
  lossFunction?: string;
}

/**
 * Options for decoding
 */
export interface DecodeOptions {
  /** Output dimension (default: the map's dimension) */
  dimension?: number;
}

/**
 * Outcome of decoding one entry sequence
 */
export interface DecodeResult {
  vector: NumericVector;
  /** Number of entries written into the vector */
  applied: number;
  /** Entries whose identity the map does not know, in input order */
  skipped: FeatureIdentity[];
}

/**
 * A decoded model record
 */
export interface DecodedModel {
  modelId: string;
  lossFunction?: string;
  coefficients: Coefficients;
}

/**
 * Canonical JSON formatting options
 */
export interface CanonicalOptions {
  /** Keys listed here come first, in this order, in every object */
  keyOrder: readonly string[];
  /** Two-space indent and a trailing newline, or one compact line */
  pretty: boolean;
}
