/**
 * Process-wide defaults. Pass overrides explicitly through the options objects.
 */

/**
 * Coefficients whose magnitude is at or below this value are not persisted
 */
export const LOW_PRECISION_TOLERANCE_THRESHOLD = 1e-9;

/**
 * Loss function name written when the caller does not supply one
 */
export const DEFAULT_LOSS_FUNCTION = "";

/**
 * Key order used when writing model records
 */
export const RECORD_KEY_ORDER = [
  "modelId",
  "lossFunction",
  "means",
  "variances",
  "name",
  "term",
  "value",
];
