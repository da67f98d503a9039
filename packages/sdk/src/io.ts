/**
 * Model record file I/O
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files throw RecordNotFoundError
 * - `.jsonl` files hold one compact record per line, other files one pretty record
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join, extname } from "node:path";
import {
  RecordNotFoundError,
  RecordReadError,
  RecordWriteError,
  StructuralError,
  isErrnoException,
} from "./errors.js";
import { safeParseJson } from "./format/canonical.js";
import { logger } from "./observability/logs.js";
import { parseModelRecord, serializeModelRecord } from "./record.js";
import type { ModelRecord } from "./types.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errnoCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws RecordWriteError on any failure
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      try {
        const dirHandle = await fs.open(dir, "r");
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      } catch (err) {
        const code = errnoCode(err);
        // Directory fsync is unsupported on some platforms; it never fails the write
        if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
          logger.debug("io.dir_fsync_failed", {
            message: dir,
            details: { error: err instanceof Error ? err.message : String(err) },
          });
        }
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { message: tmp, details: { error: String(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // ENOENT: the temp file was never created or already renamed
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.tmp_cleanup_failed", { message: tmp, details: { error: String(unlinkErr) } });
      }
    });

    throw new RecordWriteError(filePath, { cause: err });
  }
}

/**
 * Read a file as UTF-8 text
 * @throws RecordNotFoundError if the file doesn't exist
 * @throws RecordReadError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new RecordNotFoundError(filePath, { cause: err });
    }
    throw new RecordReadError(filePath, { cause: err });
  }
}

/**
 * Whether a path holds one record per line
 */
export function isRecordLinesFile(filePath: string): boolean {
  return extname(filePath).toLowerCase() === ".jsonl";
}

/**
 * Write one model record as pretty canonical JSON
 */
export async function writeModelRecord(filePath: string, record: ModelRecord): Promise<void> {
  const content = serializeModelRecord(record, { pretty: true });
  await atomicWrite(filePath, content);
  logger.debug("record.write", {
    modelId: record.modelId,
    message: filePath,
    details: { means: record.means.length, variances: record.variances?.length ?? null },
  });
}

/**
 * Read one model record from a JSON file
 * @throws StructuralError if the file is not a valid model record
 */
export async function readModelRecord(filePath: string): Promise<ModelRecord> {
  const raw = await readTextFile(filePath);
  const parsed = safeParseJson(raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw);
  if (!parsed.success) {
    throw new StructuralError(`Invalid JSON in ${filePath}: ${parsed.error}`);
  }
  return parseModelRecord(parsed.data, filePath);
}

/**
 * Write many records as JSON Lines, one compact canonical record per line
 */
export async function writeModelRecords(
  filePath: string,
  records: readonly ModelRecord[]
): Promise<void> {
  const lines = records.map((record) => serializeModelRecord(record, { pretty: false }) + "\n");
  await atomicWrite(filePath, lines.join(""));
  logger.debug("record.write_lines", { message: filePath, details: { records: records.length } });
}

/**
 * Read every record of a JSON Lines file; blank lines are ignored
 * @throws StructuralError naming the offending line
 */
export async function readModelRecords(filePath: string): Promise<ModelRecord[]> {
  const raw = await readTextFile(filePath);
  const lines = raw.split(/\r?\n/);
  const records: ModelRecord[] = [];

  lines.forEach((line, i) => {
    const text = i === 0 && line.charCodeAt(0) === 0xfeff ? line.slice(1) : line;
    if (!text.trim()) {
      return;
    }
    const source = `${filePath}:${i + 1}`;
    const parsed = safeParseJson(text);
    if (!parsed.success) {
      throw new StructuralError(`Invalid JSON in ${source}: ${parsed.error}`);
    }
    records.push(parseModelRecord(parsed.data, source));
  });

  return records;
}

/**
 * Read records from many files, in path order
 * `.jsonl` files contribute every line, other files a single record.
 * @throws StructuralError if no paths are given
 */
export async function readRecordFiles(filePaths: readonly string[]): Promise<ModelRecord[]> {
  if (!Array.isArray(filePaths) || filePaths.length === 0) {
    throw new StructuralError("The number of input paths is zero.");
  }

  const records: ModelRecord[] = [];
  for (const filePath of filePaths) {
    if (isRecordLinesFile(filePath)) {
      records.push(...(await readModelRecords(filePath)));
    } else {
      records.push(await readModelRecord(filePath));
    }
  }

  logger.debug("record.read_files", {
    details: { files: filePaths.length, records: records.length },
  });
  return records;
}
