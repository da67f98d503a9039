/**
 * Zod schemas and loaders for CLI input files
 * Coefficient files and feature index files are validated before they reach the SDK
 */

import { z } from "zod";
import { InvalidArgumentError } from "commander";
import { DenseVector, FeatureIndexMap, SparseVector } from "@coefstore/sdk";
import type { Coefficients, NumericVector } from "@coefstore/sdk";
import { readJsonFromFile } from "./io.js";

const ValueSchema = z.number().finite();
const IndexSchema = z.number().int().nonnegative();

// Dense vector: every index holds a value
export const DenseVectorSchema = z.array(ValueSchema);

// Sparse vector: parallel index/value arrays over a fixed dimension
export const SparseVectorSchema = z
  .object({
    dimension: IndexSchema,
    indices: z.array(IndexSchema),
    values: z.array(ValueSchema),
  })
  .strict()
  .superRefine((vector, ctx) => {
    if (vector.indices.length !== vector.values.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["values"],
        message: `expected ${vector.indices.length} values to match indices, got ${vector.values.length}`,
      });
    }
  });

export const VectorSchema = z.union([DenseVectorSchema, SparseVectorSchema]);

export const CoefficientsFileSchema = z
  .object({
    means: VectorSchema,
    variances: VectorSchema.optional(),
  })
  .strict();

const IdentitySchema = z.object({ name: z.string(), term: z.string() }).strict();
const IndexedIdentitySchema = z
  .object({ index: IndexSchema, name: z.string(), term: z.string() })
  .strict();

// Feature index: position-indexed identities, or identities with explicit indices
export const FeatureIndexFileSchema = z.union([
  z.array(IdentitySchema),
  z.array(IndexedIdentitySchema),
]);

export type VectorInput = z.infer<typeof VectorSchema>;
export type FeatureIndexInput = z.infer<typeof FeatureIndexFileSchema>;

/**
 * Render zod issues as "path: message" pairs
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Build an SDK vector from validated input
 */
export function toVector(input: VectorInput): NumericVector {
  if (Array.isArray(input)) {
    return new DenseVector(input);
  }
  return new SparseVector(input.dimension, input.indices, input.values);
}

/**
 * Build a feature index map from validated input
 */
export function toFeatureIndex(input: FeatureIndexInput): FeatureIndexMap {
  const identities: { name: string; term: string }[] = [];
  const indexed: [number, { name: string; term: string }][] = [];

  for (const item of input) {
    if ("index" in item) {
      indexed.push([item.index, { name: item.name, term: item.term }]);
    } else {
      identities.push(item);
    }
  }

  return indexed.length > 0
    ? FeatureIndexMap.fromEntries(indexed)
    : FeatureIndexMap.fromIdentities(identities);
}

/**
 * Validate parsed JSON as a coefficients file
 */
export function parseCoefficients(data: unknown, source: string): Coefficients {
  const result = CoefficientsFileSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid coefficients in ${source}: ${formatZodIssues(result.error)}`
    );
  }

  const means = toVector(result.data.means);
  return result.data.variances === undefined
    ? { means }
    : { means, variances: toVector(result.data.variances) };
}

/**
 * Validate parsed JSON as a feature index file
 */
export function parseFeatureIndex(data: unknown, source: string): FeatureIndexMap {
  const result = FeatureIndexFileSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid feature index in ${source}: ${formatZodIssues(result.error)}`
    );
  }
  return toFeatureIndex(result.data);
}

/**
 * Load a coefficients file: `{ "means": <vector>, "variances"?: <vector> }`
 */
export async function loadCoefficients(filePath: string): Promise<Coefficients> {
  return parseCoefficients(await readJsonFromFile(filePath), `file ${filePath}`);
}

/**
 * Load a feature index file
 */
export async function loadFeatureIndex(filePath: string): Promise<FeatureIndexMap> {
  return parseFeatureIndex(await readJsonFromFile(filePath), `file ${filePath}`);
}
