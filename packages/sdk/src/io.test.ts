import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir, sampleRecord } from "@coefstore/testkit";
import {
  atomicWrite,
  readTextFile,
  isRecordLinesFile,
  writeModelRecord,
  readModelRecord,
  writeModelRecords,
  readModelRecords,
  readRecordFiles,
} from "./io.js";
import { RecordNotFoundError, RecordWriteError, StructuralError } from "./errors.js";
import type { ModelRecord } from "./types.js";

describe("record file I/O", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("atomicWrite()", () => {
    it("should create parent directories and leave no temp files", async () => {
      const target = join(testDir, "nested", "deeper", "file.txt");
      await atomicWrite(target, "hello\n");

      expect(await readFile(target, "utf-8")).toBe("hello\n");
      expect(await readdir(join(testDir, "nested", "deeper"))).toEqual(["file.txt"]);
    });

    it("should replace existing content", async () => {
      const target = join(testDir, "file.txt");
      await atomicWrite(target, "one");
      await atomicWrite(target, "two");
      expect(await readFile(target, "utf-8")).toBe("two");
    });

    it("should wrap failures in RecordWriteError", async () => {
      // The target path is an existing directory, so the rename fails
      await expect(atomicWrite(testDir, "x")).rejects.toThrow(RecordWriteError);
    });
  });

  describe("readTextFile()", () => {
    it("should throw RecordNotFoundError for missing files", async () => {
      await expect(readTextFile(join(testDir, "missing.json"))).rejects.toThrow(
        RecordNotFoundError
      );
    });
  });

  describe("single record files", () => {
    it("should write and read back a record", async () => {
      const filePath = join(testDir, "model.json");
      const record = sampleRecord();

      await writeModelRecord(filePath, record);

      expect(await readModelRecord(filePath)).toEqual(record);
    });

    it("should write canonical pretty JSON", async () => {
      const filePath = join(testDir, "model.json");
      await writeModelRecord(filePath, {
        modelId: "m",
        means: [{ name: "a", term: "", value: 2 }],
      });

      expect(await readFile(filePath, "utf-8")).toBe(
        '{\n  "modelId": "m",\n  "means": [\n    {\n      "name": "a",\n      "term": "",\n      "value": 2\n    }\n  ]\n}\n'
      );
    });

    it("should accept a leading byte order mark", async () => {
      const filePath = join(testDir, "bom.json");
      await writeFile(filePath, "\uFEFF" + '{"modelId":"m","means":[]}', "utf-8");
      expect(await readModelRecord(filePath)).toEqual({ modelId: "m", means: [] });
    });

    it("should reject invalid JSON", async () => {
      const filePath = join(testDir, "broken.json");
      await writeFile(filePath, "{", "utf-8");
      await expect(readModelRecord(filePath)).rejects.toThrow(StructuralError);
      await expect(readModelRecord(filePath)).rejects.toThrow(`Invalid JSON in ${filePath}`);
    });

    it("should reject JSON that is not a model record", async () => {
      const filePath = join(testDir, "other.json");
      await writeFile(filePath, '{"modelId":"m"}', "utf-8");
      await expect(readModelRecord(filePath)).rejects.toThrow(
        `Invalid model record in ${filePath}`
      );
    });

    it("should not write anything when the record is invalid", async () => {
      const filePath = join(testDir, "bad.json");
      await expect(writeModelRecord(filePath, { modelId: "", means: [] })).rejects.toThrow(
        StructuralError
      );
      expect(await readdir(testDir)).toEqual([]);
    });
  });

  describe("record lines files", () => {
    const records: ModelRecord[] = [
      sampleRecord({ modelId: "a" }),
      { modelId: "b", means: [{ name: "x", term: "", value: 1 }] },
    ];

    it("should write one compact record per line", async () => {
      const filePath = join(testDir, "models.jsonl");
      await writeModelRecords(filePath, records);

      const lines = (await readFile(filePath, "utf-8")).split("\n");
      expect(lines).toHaveLength(3);
      expect(lines[1]).toBe('{"modelId":"b","means":[{"name":"x","term":"","value":1}]}');
      expect(lines[2]).toBe("");
    });

    it("should read back every record", async () => {
      const filePath = join(testDir, "models.jsonl");
      await writeModelRecords(filePath, records);
      expect(await readModelRecords(filePath)).toEqual(records);
    });

    it("should ignore blank lines", async () => {
      const filePath = join(testDir, "gaps.jsonl");
      await writeFile(
        filePath,
        '\n{"modelId":"a","means":[]}\r\n\n{"modelId":"b","means":[]}\n\n',
        "utf-8"
      );
      const read = await readModelRecords(filePath);
      expect(read.map((r) => r.modelId)).toEqual(["a", "b"]);
    });

    it("should report the line of a malformed record", async () => {
      const filePath = join(testDir, "bad.jsonl");
      await writeFile(filePath, '{"modelId":"a","means":[]}\n{"modelId":"b"}\n', "utf-8");
      await expect(readModelRecords(filePath)).rejects.toThrow(
        `Invalid model record in ${filePath}:2`
      );
    });
  });

  describe("readRecordFiles()", () => {
    it("should read single and multi record files in path order", async () => {
      const single = join(testDir, "one.json");
      const many = join(testDir, "many.jsonl");
      await writeModelRecord(single, { modelId: "first", means: [] });
      await writeModelRecords(many, [
        { modelId: "second", means: [] },
        { modelId: "third", means: [], variances: [] },
      ]);

      const records = await readRecordFiles([single, many]);

      expect(records.map((r) => r.modelId)).toEqual(["first", "second", "third"]);
      expect(records[2]?.variances).toEqual([]);
    });

    it("should reject an empty path list", async () => {
      await expect(readRecordFiles([])).rejects.toThrow("The number of input paths is zero.");
    });

    it("should fail when any file is missing", async () => {
      await expect(readRecordFiles([join(testDir, "nope.json")])).rejects.toThrow(
        RecordNotFoundError
      );
    });
  });

  describe("isRecordLinesFile()", () => {
    it("should detect the .jsonl extension", () => {
      expect(isRecordLinesFile("a/b.jsonl")).toBe(true);
      expect(isRecordLinesFile("a/b.JSONL")).toBe(true);
      expect(isRecordLinesFile("a/b.json")).toBe(false);
    });
  });
});
