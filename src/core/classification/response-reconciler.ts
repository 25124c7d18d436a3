/**
 * Response Reconciler
 *
 * Turns untrusted completion text into exactly one classification record per
 * file of the batch. Parsing escalates from a strict JSON parse to text repair
 * and finally to salvaging individual `"name": "label"` pairs; whatever the
 * model leaves out falls back to Other.
 *
 * @module
 */

import type { Batch } from "../../types/index.js";
import type { InferenceOutcome } from "../inference/interfaces/IInferenceClient.js";
import { type Result, ok, err, andThen, or } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import { ErrorCode, ReconciliationError } from "../errors.js";
import {
  FALLBACK_CATEGORY,
  coerceCategory,
  matchCategory,
  type ClassificationRecord,
  type ClassificationResult,
  type ParseOutcome,
} from "./models/classification.js";

const logger = createLogger("response-reconciler");

// =============================================================================
// Types
// =============================================================================

/**
 * One filename/label pair as the model wrote it
 */
export interface ParsedEntry {
  key: string;
  value: unknown;
}

/**
 * Completion text after parsing; never partially successful
 */
export type ParsedCompletion =
  | { outcome: "strict" | "repaired"; entries: ParsedEntry[] }
  | { outcome: "failed"; reason: string };

const FILENAME_KEYS = ["filename", "fileName", "file_name", "file", "name"] as const;
const CATEGORY_KEYS = ["category", "label", "folder", "directory"] as const;

// =============================================================================
// Text Repair
// =============================================================================

/**
 * Strip what commonly surrounds the JSON: code fences, preambles, trailing
 * remarks, stray quotes, and trailing commas.
 */
export function repairCompletion(raw: string): string {
  let text = raw.trim();

  text = text.replace(/```[A-Za-z]*[ \t]*\r?\n?/g, "");

  const objectStart = text.indexOf("{");
  const arrayStart = text.indexOf("[");
  const start =
    objectStart === -1 ? arrayStart : arrayStart === -1 ? objectStart : Math.min(objectStart, arrayStart);

  if (start !== -1) {
    const close = text[start] === "{" ? "}" : "]";
    const end = text.lastIndexOf(close);
    text = end > start ? text.slice(start, end + 1) : text.slice(start);
  }

  return stripTrailingCommas(text).trim();
}

const CLOSING_BRACKET = /\s*[}\]]/y;

/**
 * Drop commas directly before `}` or `]`. String contents are copied as is.
 */
export function stripTrailingCommas(text: string): string {
  let result = "";
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inString) {
      result += char;
      if (char === "\\") {
        result += text.charAt(i + 1);
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === ",") {
      CLOSING_BRACKET.lastIndex = i + 1;
      if (CLOSING_BRACKET.test(text)) continue;
    }
    result += char;
  }

  return result;
}

/**
 * Last resort: collect every complete `"key": "value"` pair in the text.
 * Handles truncated output and missing commas.
 */
export function salvagePairs(raw: string): ParsedEntry[] {
  const pairPattern = /"((?:[^"\\]|\\.)*)"\s*:\s*"((?:[^"\\]|\\.)*)"/g;
  const entries: ParsedEntry[] = [];

  for (const match of raw.matchAll(pairPattern)) {
    const key = decodeJsonString(match[1] ?? "");
    const value = decodeJsonString(match[2] ?? "");
    if (key.ok && value.ok) {
      entries.push({ key: key.value, value: value.value });
    }
  }

  return entries;
}

function decodeJsonString(body: string): Result<string, string> {
  const decoded = parseJson(`"${body}"`);
  if (!decoded.ok) return decoded;
  return typeof decoded.value === "string" ? ok(decoded.value) : err("not a string");
}

// =============================================================================
// Structural Parse
// =============================================================================

function parseJson(text: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickField(item: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (key in item) return item[key];
  }
  return undefined;
}

/**
 * Accepts `{name: label}`, a single-key wrapper around either shape, or
 * `[{filename, category}]`.
 */
export function extractEntries(value: unknown): Result<ParsedEntry[], string> {
  if (Array.isArray(value)) {
    const entries: ParsedEntry[] = [];
    for (const item of value) {
      if (!isPlainObject(item)) continue;
      const key = pickField(item, FILENAME_KEYS);
      if (typeof key !== "string") continue;
      entries.push({ key, value: pickField(item, CATEGORY_KEYS) });
    }
    if (entries.length === 0 && value.length > 0) {
      return err("array holds no {filename, category} objects");
    }
    return ok(entries);
  }

  if (isPlainObject(value)) {
    const keys = Object.keys(value);
    const only = keys.length === 1 ? value[keys[0] ?? ""] : undefined;
    if (isPlainObject(only) || Array.isArray(only)) {
      return extractEntries(only);
    }
    return ok(Object.entries(value).map(([key, label]) => ({ key, value: label })));
  }

  return err(`expected a JSON object or array, got ${value === null ? "null" : typeof value}`);
}

/**
 * Parse completion text into entries, tagging how much repair it took
 */
export function parseCompletion(text: string): ParsedCompletion {
  const strict = andThen(parseJson(text.trim()), extractEntries);
  if (strict.ok) {
    return { outcome: "strict", entries: strict.value };
  }

  const strictError = strict.error;
  const repaired = or(
    andThen(parseJson(repairCompletion(text)), extractEntries),
    (): Result<ParsedEntry[], string> => {
      const salvaged = salvagePairs(text);
      return salvaged.length > 0 ? ok(salvaged) : err(strictError);
    }
  );

  if (repaired.ok) {
    return { outcome: "repaired", entries: repaired.value };
  }

  return { outcome: "failed", reason: `Unparseable completion: ${repaired.error}` };
}

// =============================================================================
// Reconciliation
// =============================================================================

function fallbackRecords(batch: Batch): ClassificationRecord[] {
  return batch.entries.map((entry): ClassificationRecord => ({
    fileName: entry.fileName,
    category: FALLBACK_CATEGORY,
    source: "fallback",
  }));
}

/**
 * Produce the batch's ClassificationResult. Every file of the batch gets
 * exactly one record; names are matched by exact string equality only.
 */
export function reconcileBatch(batch: Batch, outcome: InferenceOutcome): ClassificationResult {
  if (outcome.status === "failed") {
    logger.warn({ batchId: batch.id, reason: outcome.reason }, "Batch failed, every file falls back to Other");
    return {
      batchId: batch.id,
      outcome: "failed",
      records: fallbackRecords(batch),
      unmatched: [],
      failureReason: outcome.reason,
    };
  }

  const parsed = parseCompletion(outcome.text);
  if (parsed.outcome === "failed") {
    const error = new ReconciliationError(parsed.reason, ErrorCode.RECONCILE_UNPARSEABLE, {
      batchId: batch.id,
      completion: outcome.text.slice(0, 500),
    });
    logger.warn({ err: error }, "Could not parse completion, every file falls back to Other");
    return {
      batchId: batch.id,
      outcome: "failed",
      records: fallbackRecords(batch),
      unmatched: [],
      failureReason: parsed.reason,
    };
  }

  return matchEntries(batch, parsed.entries, parsed.outcome);
}

function matchEntries(
  batch: Batch,
  entries: ParsedEntry[],
  outcome: Exclude<ParseOutcome, "failed">
): ClassificationResult {
  const labels = new Map<string, unknown>();
  for (const entry of entries) {
    if (!labels.has(entry.key)) {
      labels.set(entry.key, entry.value);
    }
  }

  const fileNames = new Set(batch.entries.map((entry) => entry.fileName));
  const records: ClassificationRecord[] = batch.entries.map((entry) => {
    if (!labels.has(entry.fileName)) {
      return { fileName: entry.fileName, category: FALLBACK_CATEGORY, source: "fallback" };
    }
    const value = labels.get(entry.fileName);
    const known = typeof value === "string" ? matchCategory(value) : null;
    return {
      fileName: entry.fileName,
      category: known ?? coerceCategory(value),
      source: known ? "model" : "coerced",
    };
  });

  const unmatched = [...labels.keys()].filter((key) => !fileNames.has(key));
  const missing = records.filter((record) => record.source === "fallback").length;

  if (missing > 0 || unmatched.length > 0) {
    logger.info(
      { batchId: batch.id, missing, unmatched },
      "Completion for %s left %d file(s) unclassified",
      batch.id,
      missing
    );
  }
  logger.debug({ batchId: batch.id, outcome, records: records.length }, "Reconciled batch");

  return { batchId: batch.id, outcome, records, unmatched };
}
