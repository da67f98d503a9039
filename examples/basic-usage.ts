/**
 * Basic Usage Example
 *
 * Encodes a small model, writes it to disk, and decodes it against a
 * feature index that has since gained and lost features.
 */

import {
  DenseVector,
  FeatureIndexMap,
  SparseVector,
  decodeModel,
  encodeModel,
  readModelRecord,
  writeModelRecord,
} from "@coefstore/sdk";
import { rm } from "node:fs/promises";

async function main(): Promise<void> {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  // Features of the training run, in vector order
  const trainFeatures = FeatureIndexMap.fromIdentities([
    { name: "bias", term: "" },
    { name: "age", term: "" },
    { name: "country", term: "fr" },
    { name: "country", term: "de" },
  ]);

  const record = encodeModel(
    {
      means: new DenseVector([0.3, -1.25, 0, 2]),
      variances: new SparseVector(4, [1, 3], [0.01, 0.04]),
    },
    "ctr-model",
    trainFeatures,
    { lossFunction: "logistic" }
  );

  console.log("Encoded entries, largest magnitude first:");
  for (const entry of record.means) {
    console.log(`  ${entry.name}\t${entry.term}\t${entry.value}`);
  }

  const recordPath = `${dataDir}/ctr-model.json`;
  await writeModelRecord(recordPath, record);
  console.log(`\nWrote ${recordPath}`);

  // Serving features: "country/de" is gone and "device/mobile" is new
  const servingFeatures = FeatureIndexMap.fromIdentities([
    { name: "device", term: "mobile" },
    { name: "age", term: "" },
    { name: "bias", term: "" },
  ]);

  const loaded = await readModelRecord(recordPath);
  const decoded = decodeModel(loaded, servingFeatures);

  console.log("\nDecoded against serving features:");
  console.log(`  means:     ${Array.from(decoded.coefficients.means.toArray()).join(", ")}`);
  const variances = decoded.coefficients.variances;
  if (variances) {
    console.log(`  variances: ${Array.from(variances.toArray()).join(", ")}`);
  }

  await rm("./examples-data", { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
