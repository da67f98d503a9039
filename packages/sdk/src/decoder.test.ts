import { describe, it, expect, afterEach, vi } from "vitest";
import {
  decodeEntries,
  decodeVector,
  decodeMeans,
  decodeVariances,
  decodeModel,
} from "./decoder.js";
import { encodeModel, encodeVector } from "./encoder.js";
import { FeatureIndexMap } from "./feature-index.js";
import { DenseVector, SparseVector } from "./vector.js";
import { StructuralError } from "./errors.js";
import type { IdentityToIndex, ModelRecord, NameTermValue } from "./types.js";

function featureMap(dimension: number): FeatureIndexMap {
  return FeatureIndexMap.fromIdentities(
    Array.from({ length: dimension }, (_, i) => ({ name: `f${i}`, term: `t${i}` }))
  );
}

function values(vector: { toArray(): Float64Array }): number[] {
  return Array.from(vector.toArray());
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeVector", () => {
  it("should place each entry at its mapped index and leave the rest zero", () => {
    const entries: NameTermValue[] = [
      { name: "f3", term: "t3", value: -2 },
      { name: "f0", term: "t0", value: 1.5 },
    ];

    const vector = decodeVector(entries, featureMap(5));

    expect(vector.kind).toBe("dense");
    expect(values(vector)).toEqual([1.5, 0, 0, -2, 0]);
  });

  it("should round-trip a dense vector with near-zero values replaced by zero", () => {
    const original = [0.75, 1e-12, -4, 0, 3.25e-3, -1e-10, 0.1 + 0.2];
    const map = featureMap(original.length);

    const decoded = decodeVector(encodeVector(new DenseVector(original), map), map);

    expect(values(decoded)).toEqual([0.75, 0, -4, 0, 3.25e-3, 0, 0.1 + 0.2]);
  });

  it("should round-trip a sparse vector to its dense form", () => {
    const map = featureMap(6);
    const sparse = new SparseVector(6, [5, 2], [-8, 0.125]);

    const decoded = decodeVector(encodeVector(sparse, map), map);

    expect(values(decoded)).toEqual([0, 0, 0.125, 0, 0, -8]);
  });

  it("should skip entries whose identity is unknown without touching any slot", () => {
    const known: NameTermValue[] = [
      { name: "f1", term: "t1", value: 4 },
      { name: "f2", term: "t2", value: -1 },
    ];
    const unknown: NameTermValue = { name: "retired", term: "", value: 99 };
    const map = featureMap(3);

    const withUnknown = decodeVector([known[0]!, unknown, known[1]!], map);
    const withoutUnknown = decodeVector(known, map);

    expect(values(withUnknown)).toEqual(values(withoutUnknown));
    expect(values(withUnknown)).toEqual([0, 4, -1]);
  });

  it("should treat an identity differing only in term as unknown", () => {
    const vector = decodeVector([{ name: "f1", term: "other", value: 7 }], featureMap(2));
    expect(values(vector)).toEqual([0, 0]);
  });

  it("should let the later entry win when an identity repeats (observed behaviour)", () => {
    const vector = decodeVector(
      [
        { name: "f0", term: "t0", value: 1 },
        { name: "f0", term: "t0", value: 2 },
      ],
      featureMap(1)
    );
    expect(values(vector)).toEqual([2]);
  });

  it("should let the later entry win when two identities share an index (observed behaviour)", () => {
    // Non-bijective map
    const collapsing: IdentityToIndex = { dimension: 2, indexOf: () => 1 };
    const vector = decodeVector(
      [
        { name: "a", term: "", value: 3 },
        { name: "b", term: "", value: 5 },
      ],
      collapsing
    );
    expect(values(vector)).toEqual([0, 5]);
  });

  it("should use an explicit dimension over the map's", () => {
    const vector = decodeVector([{ name: "f1", term: "t1", value: 1 }], featureMap(2), {
      dimension: 4,
    });
    expect(values(vector)).toEqual([0, 1, 0, 0]);
  });

  it("should decode an empty sequence to a zero vector", () => {
    expect(values(decodeVector([], featureMap(3)))).toEqual([0, 0, 0]);
  });

  it("should accept any iterable of entries", () => {
    function* entries(): Generator<NameTermValue> {
      yield { name: "f1", term: "t1", value: 2 };
    }
    expect(values(decodeVector(entries(), featureMap(2)))).toEqual([0, 2]);
  });

  it("should not mutate its inputs", () => {
    const entries: NameTermValue[] = [{ name: "f0", term: "t0", value: 1 }];
    const snapshot = structuredClone(entries);
    decodeVector(entries, featureMap(1));
    expect(entries).toEqual(snapshot);
  });

  describe("structural errors", () => {
    it("should reject missing entries", () => {
      expect(() =>
        decodeVector(undefined as unknown as NameTermValue[], featureMap(1))
      ).toThrow("Entries to decode are missing or not iterable");
    });

    it("should reject a missing map", () => {
      expect(() => decodeVector([], undefined as unknown as IdentityToIndex)).toThrow(
        "Identity to index map is missing or malformed"
      );
    });

    it("should reject a missing or invalid dimension", () => {
      const noDimension = { indexOf: () => undefined } as unknown as IdentityToIndex;
      expect(() => decodeVector([], noDimension)).toThrow(StructuralError);
      expect(() => decodeVector([], featureMap(1), { dimension: -1 })).toThrow(
        "Decode dimension must be a non-negative integer, got: -1"
      );
    });

    it("should reject entries that are not name, term, value triples", () => {
      const entries: unknown[] = [{ name: "f0", term: "t0", value: 1 }, null];
      expect(() => decodeVector(entries as NameTermValue[], featureMap(1))).toThrow(
        "Entry 1 is not a (name, term, value) triple"
      );

      const missingTerm: unknown[] = [{ name: "f0", value: 1 }];
      expect(() => decodeVector(missingTerm as NameTermValue[], featureMap(1))).toThrow(
        StructuralError
      );
    });

    it("should reject a map index outside the dimension", () => {
      expect(() =>
        decodeVector([{ name: "f2", term: "t2", value: 1 }], featureMap(3), { dimension: 2 })
      ).toThrow("Feature (f2, t2) maps to index 2, outside dimension 2");
    });
  });
});

describe("decodeEntries", () => {
  it("should report applied and skipped entries", () => {
    const result = decodeEntries(
      [
        { name: "f0", term: "t0", value: 1 },
        { name: "gone", term: "x", value: 2 },
        { name: "f1", term: "t1", value: 3 },
        { name: "gone", term: "y", value: 4 },
      ],
      featureMap(2)
    );

    expect(result.applied).toBe(2);
    expect(result.skipped).toEqual([
      { name: "gone", term: "x" },
      { name: "gone", term: "y" },
    ]);
    expect(values(result.vector)).toEqual([1, 3]);
  });

  it("should emit one debug event summarising skipped entries", () => {
    const previous = process.env.COEFSTORE_DEBUG;
    process.env.COEFSTORE_DEBUG = "1";
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    try {
      decodeEntries(
        [
          { name: "x", term: "", value: 1 },
          { name: "y", term: "", value: 1 },
        ],
        featureMap(1)
      );
    } finally {
      if (previous === undefined) {
        delete process.env.COEFSTORE_DEBUG;
      } else {
        process.env.COEFSTORE_DEBUG = previous;
      }
    }

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toContain(
      "[decode.skip_unknown] 2 entries with unknown features skipped"
    );
  });
});

describe("record decoding", () => {
  const map = featureMap(3);
  const record: ModelRecord = {
    modelId: "m1",
    lossFunction: "squared",
    means: [
      { name: "f2", term: "t2", value: 6 },
      { name: "f0", term: "t0", value: -1 },
    ],
    variances: [{ name: "f0", term: "t0", value: 0.5 }],
  };

  it("should decode means only", () => {
    expect(values(decodeMeans(record, map))).toEqual([-1, 0, 6]);
  });

  it("should decode variances when present", () => {
    const variances = decodeVariances(record, map);
    expect(variances && values(variances)).toEqual([0.5, 0, 0]);
  });

  it("should return undefined variances when the record has none", () => {
    const { variances: _omitted, ...withoutVariances } = record;
    expect(decodeVariances(withoutVariances, map)).toBeUndefined();
  });

  it("should decode an empty variances list to a zero vector", () => {
    const variances = decodeVariances({ ...record, variances: [] }, map);
    expect(variances && values(variances)).toEqual([0, 0, 0]);
  });

  it("should decode a whole model", () => {
    const decoded = decodeModel(record, map);
    expect(decoded.modelId).toBe("m1");
    expect(decoded.lossFunction).toBe("squared");
    expect(values(decoded.coefficients.means)).toEqual([-1, 0, 6]);
    const variances = decoded.coefficients.variances;
    expect(variances && values(variances)).toEqual([0.5, 0, 0]);
  });

  it("should round-trip a model through encode and decode", () => {
    const encoded = encodeModel(
      { means: new DenseVector([2, 0, -3]), variances: new DenseVector([0.1, 0.2, 0.3]) },
      "roundtrip",
      map
    );
    const decoded = decodeModel(encoded, map);
    expect(values(decoded.coefficients.means)).toEqual([2, 0, -3]);
    const variances = decoded.coefficients.variances;
    expect(variances && values(variances)).toEqual([0.1, 0.2, 0.3]);
  });

  it("should load a model against a narrower feature universe", () => {
    const narrower = FeatureIndexMap.fromIdentities([
      { name: "f2", term: "t2" },
      { name: "new", term: "" },
    ]);
    expect(values(decodeMeans(record, narrower))).toEqual([6, 0]);
  });
});
