/**
 * Canonical JSON formatting for model records
 *
 * Invariants:
 * - Pure function: same input always produces same output bytes
 * - Object keys follow the given key order; array order is preserved
 * - LF line endings; pretty output ends with exactly one newline
 */

import type { CanonicalOptions } from "../types.js";

/**
 * Canonicalize a JSON value with a fixed key order
 */
export function canonicalize(input: unknown, options: CanonicalOptions): string {
  const rank = (key: string): number => {
    const position = options.keyOrder.indexOf(key);
    return position === -1 ? options.keyOrder.length : position;
  };

  const normalize = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(normalize);
    }

    const fields = Object.entries(value).sort(([a], [b]) => rank(a) - rank(b));
    return Object.fromEntries(fields.map(([key, field]) => [key, normalize(field)]));
  };

  const json = JSON.stringify(normalize(input), null, options.pretty ? 2 : undefined);
  return options.pretty ? json + "\n" : json;
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const data: unknown = JSON.parse(raw);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
