/**
 * Vector -> named entry encoding
 *
 * Invariants:
 * - Only entries with |value| > threshold are emitted
 * - Output is ordered by |value| descending; equal magnitudes keep ascending
 *   index order (observed behaviour of the stable sort, not a contract)
 * - Every retained index is resolved before anything is returned: a missing
 *   identity fails the whole call and no partial output escapes
 * - Inputs are never mutated
 */

import { DEFAULT_LOSS_FUNCTION, LOW_PRECISION_TOLERANCE_THRESHOLD } from "./constants.js";
import { LookupError, StructuralError } from "./errors.js";
import { isNumericVector } from "./vector.js";
import type {
  Coefficients,
  EncodeModelOptions,
  EncodeOptions,
  IndexToIdentity,
  ModelRecord,
  NameTermValue,
  NumericVector,
} from "./types.js";

/**
 * Resolve and validate the significance threshold
 */
export function resolveThreshold(threshold: number | undefined): number {
  const resolved = threshold ?? LOW_PRECISION_TOLERANCE_THRESHOLD;
  if (!Number.isFinite(resolved) || resolved < 0) {
    throw new StructuralError(`Threshold must be a non-negative finite number, got: ${resolved}`);
  }
  return resolved;
}

/**
 * Encode one vector as named entries ranked by magnitude
 * @param vector - Dense or sparse vector
 * @param indexToIdentity - Index -> feature resolution
 * @returns Entries with |value| > threshold, largest magnitude first
 * @throws LookupError if a retained index has no feature identity
 */
export function encodeVector(
  vector: NumericVector,
  indexToIdentity: IndexToIdentity,
  options: EncodeOptions = {}
): NameTermValue[] {
  if (!isNumericVector(vector)) {
    throw new StructuralError("Vector to encode is missing or malformed");
  }
  if (typeof indexToIdentity?.identityAt !== "function") {
    throw new StructuralError("Index to identity map is missing or malformed");
  }
  const threshold = resolveThreshold(options.threshold);

  const retained: [number, number][] = [];
  for (const [index, value] of vector.activeEntries()) {
    if (Math.abs(value) > threshold) {
      retained.push([index, value]);
    }
  }

  retained.sort((a, b) => Math.abs(b[1]) - Math.abs(a[1]));

  return retained.map(([index, value]) => {
    const identity = indexToIdentity.identityAt(index);
    if (!identity) {
      throw new LookupError(index);
    }
    return { name: identity.name, term: identity.term, value };
  });
}

/**
 * Build the persisted record of a model
 * @param coefficients - Means and optional variances
 * @param modelId - Caller-supplied model identifier
 * @param indexToIdentity - Index -> feature resolution shared by both vectors
 * @returns Record whose `variances` field exists only if the model has variances
 */
export function encodeModel(
  coefficients: Coefficients,
  modelId: string,
  indexToIdentity: IndexToIdentity,
  options: EncodeModelOptions = {}
): ModelRecord {
  if (typeof modelId !== "string" || modelId.length === 0) {
    throw new StructuralError("Model id must be a non-empty string");
  }
  if (!coefficients || !isNumericVector(coefficients.means)) {
    throw new StructuralError(`Model "${modelId}" has no mean vector`);
  }

  const { means, variances } = coefficients;
  if (variances !== undefined && variances.dimension !== means.dimension) {
    throw new StructuralError(
      `Model "${modelId}" has ${means.dimension} means but ${variances.dimension} variances`
    );
  }

  const record: ModelRecord = {
    modelId,
    lossFunction: options.lossFunction ?? DEFAULT_LOSS_FUNCTION,
    means: encodeVector(means, indexToIdentity, options),
  };

  if (variances !== undefined) {
    record.variances = encodeVector(variances, indexToIdentity, options);
  }

  return record;
}
