/**
 * Record fixtures
 */

import type { ModelRecord } from "@coefstore/sdk";

/**
 * Small record with means and variances over three features
 */
export function sampleRecord(overrides: Partial<ModelRecord> = {}): ModelRecord {
  return {
    modelId: "model-a",
    lossFunction: "",
    means: [
      { name: "f1", term: "t1", value: 5 },
      { name: "f3", term: "t3", value: -3 },
      { name: "f0", term: "t0", value: 0.5 },
    ],
    variances: [
      { name: "f1", term: "t1", value: 0.25 },
      { name: "f0", term: "t0", value: 0.125 },
    ],
    ...overrides,
  };
}
