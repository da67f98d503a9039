/**
 * Named entry -> dense vector decoding
 *
 * Invariants:
 * - Output is a fresh dense vector of the requested dimension, zero where no entry lands
 * - Entries whose identity the map does not know are skipped, never raised
 * - When two entries land on the same index the later one wins
 */

import { StructuralError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { DenseVector } from "./vector.js";
import type {
  DecodeOptions,
  DecodeResult,
  DecodedModel,
  FeatureIdentity,
  IdentityToIndex,
  ModelRecord,
  NameTermValue,
  NumericVector,
} from "./types.js";

function resolveDimension(identityToIndex: IdentityToIndex, options: DecodeOptions): number {
  const dimension = options.dimension ?? identityToIndex.dimension;
  if (typeof dimension !== "number" || !Number.isInteger(dimension) || dimension < 0) {
    throw new StructuralError(`Decode dimension must be a non-negative integer, got: ${dimension}`);
  }
  return dimension;
}

function isEntry(value: unknown): value is NameTermValue {
  return (
    value !== null &&
    typeof value === "object" &&
    "name" in value &&
    typeof value.name === "string" &&
    "term" in value &&
    typeof value.term === "string" &&
    "value" in value &&
    typeof value.value === "number"
  );
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Decode entries into a dense vector and report what was applied and skipped
 * @param entries - Entries in persisted order
 * @param identityToIndex - Feature -> index resolution
 * @throws StructuralError if inputs are missing, an entry is malformed or the map points outside the dimension
 */
export function decodeEntries(
  entries: Iterable<NameTermValue>,
  identityToIndex: IdentityToIndex,
  options: DecodeOptions = {}
): DecodeResult {
  if (!isIterable(entries)) {
    throw new StructuralError("Entries to decode are missing or not iterable");
  }
  if (typeof identityToIndex?.indexOf !== "function") {
    throw new StructuralError("Identity to index map is missing or malformed");
  }
  const dimension = resolveDimension(identityToIndex, options);

  const values = new Float64Array(dimension);
  const skipped: FeatureIdentity[] = [];
  let applied = 0;
  let position = 0;

  for (const entry of entries) {
    if (!isEntry(entry)) {
      throw new StructuralError(`Entry ${position} is not a (name, term, value) triple`);
    }
    position++;
    const index = identityToIndex.indexOf(entry);
    if (index === undefined) {
      skipped.push({ name: entry.name, term: entry.term });
      continue;
    }
    if (!Number.isInteger(index) || index < 0 || index >= dimension) {
      throw new StructuralError(
        `Feature (${entry.name}, ${entry.term}) maps to index ${index}, outside dimension ${dimension}`
      );
    }
    values[index] = entry.value;
    applied++;
  }

  if (skipped.length > 0) {
    logger.debug("decode.skip_unknown", {
      message: `${skipped.length} entries with unknown features skipped`,
      details: { skipped: skipped.length, applied, dimension },
    });
  }

  return { vector: new DenseVector(values), applied, skipped };
}

/**
 * Decode entries into a dense vector
 */
export function decodeVector(
  entries: Iterable<NameTermValue>,
  identityToIndex: IdentityToIndex,
  options: DecodeOptions = {}
): NumericVector {
  return decodeEntries(entries, identityToIndex, options).vector;
}

function assertRecord(record: ModelRecord): void {
  if (!record || typeof record !== "object") {
    throw new StructuralError("Model record is missing");
  }
}

/**
 * Decode the mean vector of a record
 */
export function decodeMeans(
  record: ModelRecord,
  identityToIndex: IdentityToIndex,
  options: DecodeOptions = {}
): NumericVector {
  assertRecord(record);
  return decodeVector(record.means, identityToIndex, options);
}

/**
 * Decode the variance vector of a record
 * @returns undefined when the record carries no variances
 */
export function decodeVariances(
  record: ModelRecord,
  identityToIndex: IdentityToIndex,
  options: DecodeOptions = {}
): NumericVector | undefined {
  assertRecord(record);
  if (record.variances === undefined) {
    return undefined;
  }
  return decodeVector(record.variances, identityToIndex, options);
}

/**
 * Decode a whole record, including variances when present
 */
export function decodeModel(
  record: ModelRecord,
  identityToIndex: IdentityToIndex,
  options: DecodeOptions = {}
): DecodedModel {
  const means = decodeMeans(record, identityToIndex, options);
  const variances = decodeVariances(record, identityToIndex, options);

  const decoded: DecodedModel = {
    modelId: record.modelId,
    coefficients: variances === undefined ? { means } : { means, variances },
  };
  if (record.lossFunction !== undefined) {
    decoded.lossFunction = record.lossFunction;
  }
  return decoded;
}
