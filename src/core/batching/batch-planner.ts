/**
 * Batch Planner
 *
 * Splits scanned files into ordered, fixed-size batches. Pure.
 *
 * @module
 */

import type { Batch, FileEntry } from "../../types/index.js";
import { calculateContentHash } from "../../utils/fs.js";

/**
 * Deterministic correlation id: position plus a short hash of the filenames
 */
export function createBatchId(index: number, entries: readonly FileEntry[]): string {
  const digest = calculateContentHash(entries.map((entry) => entry.fileName).join("\u0000"));
  return `batch-${String(index + 1).padStart(3, "0")}-${digest.slice(0, 8)}`;
}

/**
 * Partition entries into contiguous chunks of at most `batchSize`,
 * keeping scan order. The last chunk may be smaller.
 *
 * @example
 * ```typescript
 * const batches = planBatches(entries, 15);
 * // 32 entries -> batches of 15, 15 and 2
 * ```
 */
export function planBatches(entries: readonly FileEntry[], batchSize: number): Batch[] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: Batch[] = [];

  for (let start = 0; start < entries.length; start += size) {
    const chunk = Object.freeze(entries.slice(start, start + size));
    const index = batches.length;
    batches.push(Object.freeze({ id: createBatchId(index, chunk), index, entries: chunk }));
  }

  return batches;
}
