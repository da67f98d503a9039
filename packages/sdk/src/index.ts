/**
 * Coefstore SDK
 *
 * Persist numeric coefficient vectors as named (name, term, value) model
 * records and load them back against any feature index
 */

// Re-export types
export type {
  FeatureIdentity,
  NameTermValue,
  NumericVector,
  Coefficients,
  IndexToIdentity,
  IdentityToIndex,
  ModelRecord,
  EncodeOptions,
  EncodeModelOptions,
  DecodeOptions,
  DecodeResult,
  DecodedModel,
  CanonicalOptions,
} from "./types.js";

export { LOW_PRECISION_TOLERANCE_THRESHOLD, DEFAULT_LOSS_FUNCTION } from "./constants.js";

// Vectors and feature maps
export { DenseVector, SparseVector, isNumericVector } from "./vector.js";
export { FeatureIndexMap, identityKey, identityEquals, formatIdentity } from "./feature-index.js";

// Codec
export { encodeVector, encodeModel, resolveThreshold } from "./encoder.js";
export {
  decodeEntries,
  decodeVector,
  decodeMeans,
  decodeVariances,
  decodeModel,
} from "./decoder.js";

// Records and formatting
export { MODEL_RECORD_SCHEMA, parseModelRecord, serializeModelRecord } from "./record.js";
export { canonicalize, safeParseJson } from "./format/canonical.js";

// Re-export I/O operations
export {
  atomicWrite,
  readTextFile,
  isRecordLinesFile,
  writeModelRecord,
  readModelRecord,
  writeModelRecords,
  readModelRecords,
  readRecordFiles,
} from "./io.js";

// Re-export errors
export {
  CoefstoreError,
  LookupError,
  StructuralError,
  RecordNotFoundError,
  RecordReadError,
  RecordWriteError,
} from "./errors.js";

export { logger } from "./observability/logs.js";
export type { LogEntry } from "./observability/logs.js";
