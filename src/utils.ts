/**
 * Utility functions for locator-healer
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage } from "./logger";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Milliseconds since `start` (a `performance.now()` reading), rounded to 2 decimals */
export function elapsedMs(start: number): number {
  return round(performance.now() - start, 2);
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export type JsonReadResult<T> =
  | { status: "ok"; value: T }
  | { status: "missing" }
  | { status: "invalid"; error: string };

/**
 * Read and validate a JSON file. A missing file and a corrupt file are reported
 * separately so callers can stay quiet about the first and warn about the second.
 */
export async function readJson<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<JsonReadResult<T>> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return { status: "missing" };
    return { status: "invalid", error: errorMessage(err) };
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { status: "invalid", error: `malformed JSON: ${errorMessage(err)}` };
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { status: "invalid", error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { status: "ok", value: parsed.data };
}

/**
 * Write JSON file atomically
 */
export async function writeAtomic(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
  await fs.rename(tmp, file);
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
  /** Called after a failed attempt; `delayMs` is null when no further attempt follows */
  onFailure?: (err: unknown, attempt: number, delayMs: number | null) => void;
}

/**
 * Run an async operation up to `maxAttempts` times with exponential backoff.
 * After failed attempt `i` (0-indexed) it waits `baseDelayMs * 2^i` before the next one.
 * Rethrows the last error once every attempt has failed.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown = new Error("no attempts were made");
  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const isLast = attempt === options.maxAttempts - 1;
      const delay = isLast ? null : options.baseDelayMs * 2 ** attempt;
      options.onFailure?.(err, attempt, delay);
      if (delay !== null) {
        await wait(delay);
      }
    }
  }
  throw lastError;
}
