/**
 * Model record schema, validation and canonical serialization
 *
 * Records are JSON documents validated with a JSON Schema. Entry order inside
 * `means` and `variances` is preserved exactly as encoded.
 */

import { Ajv } from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import { RECORD_KEY_ORDER } from "./constants.js";
import { StructuralError } from "./errors.js";
import { canonicalize } from "./format/canonical.js";
import type { ModelRecord, NameTermValue } from "./types.js";

/**
 * Shape accepted on read; `variances: null` means "no variances"
 */
interface ModelRecordDocument {
  modelId: string;
  lossFunction?: string;
  means: NameTermValue[];
  variances?: NameTermValue[] | null;
}

const NAME_TERM_VALUE_SCHEMA = {
  type: "object",
  properties: {
    name: { type: "string" },
    term: { type: "string" },
    value: { type: "number" },
  },
  required: ["name", "term", "value"],
  additionalProperties: false,
} as const;

/**
 * JSON Schema of a persisted model record
 */
export const MODEL_RECORD_SCHEMA = {
  $id: "coefstore/model-record@1",
  type: "object",
  properties: {
    modelId: { type: "string", minLength: 1 },
    lossFunction: { type: "string" },
    means: { type: "array", items: NAME_TERM_VALUE_SCHEMA },
    variances: { type: ["array", "null"], items: NAME_TERM_VALUE_SCHEMA },
  },
  required: ["modelId", "means"],
  additionalProperties: false,
} as const;

let compiled: ValidateFunction<ModelRecordDocument> | undefined;

function getValidator(): ValidateFunction<ModelRecordDocument> {
  if (!compiled) {
    const ajv = new Ajv({
      strict: true,
      strictNumbers: true,
      allErrors: true,
      allowUnionTypes: true,
    });
    compiled = ajv.compile<ModelRecordDocument>(MODEL_RECORD_SCHEMA);
  }
  return compiled;
}

/**
 * Render Ajv errors as "pointer: message" strings
 */
function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation failure";
  }
  return errors
    .map((error) => `${error.instancePath || "/"}: ${error.message ?? error.keyword}`)
    .join("; ");
}

function copyEntries(entries: readonly NameTermValue[]): NameTermValue[] {
  return entries.map((entry) => ({ name: entry.name, term: entry.term, value: entry.value }));
}

/**
 * Validate an untrusted value and return it as a model record
 * @param data - Parsed JSON
 * @param source - Where the value came from, for error messages
 * @throws StructuralError listing every schema violation
 */
export function parseModelRecord(data: unknown, source?: string): ModelRecord {
  const validate = getValidator();
  if (!validate(data)) {
    const where = source ? ` in ${source}` : "";
    throw new StructuralError(`Invalid model record${where}: ${describeErrors(validate.errors)}`);
  }

  const record: ModelRecord = {
    modelId: data.modelId,
    means: copyEntries(data.means),
  };
  if (data.lossFunction !== undefined) {
    record.lossFunction = data.lossFunction;
  }
  if (data.variances !== undefined && data.variances !== null) {
    record.variances = copyEntries(data.variances);
  }
  return record;
}

/**
 * Serialize a record to canonical JSON
 * @param options.pretty - Two-space indented with trailing newline (default) or one compact line
 * @throws StructuralError if the record is malformed; NaN and Infinity are rejected since JSON cannot carry them
 */
export function serializeModelRecord(
  record: ModelRecord,
  options: { pretty?: boolean } = {}
): string {
  const validate = getValidator();
  if (!validate(record)) {
    throw new StructuralError(`Invalid model record: ${describeErrors(validate.errors)}`);
  }

  return canonicalize(record, { keyOrder: RECORD_KEY_ORDER, pretty: options.pretty ?? true });
}
