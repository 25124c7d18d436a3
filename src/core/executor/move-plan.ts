/**
 * Move Plan
 *
 * The run-wide mapping of scanned file to destination folder. Batches are
 * merged in as they are reconciled; once execution starts the plan is sealed.
 *
 * @module
 */

import * as path from "node:path";
import type { Batch, FileEntry } from "../../types/index.js";
import type { Category, ClassificationResult } from "../classification/models/classification.js";
import { FALLBACK_CATEGORY, matchCategory } from "../classification/models/classification.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("move-plan");

// =============================================================================
// Directory Names
// =============================================================================

// eslint-disable-next-line no-control-regex
const ILLEGAL_DIRECTORY_CHARS = /[<>:"/\\|?*\u0000-\u001F\u007F]/g;

/**
 * Turn a category label into a folder name that is legal on common
 * filesystems. Taxonomy labels come back in their canonical spelling.
 *
 * @example
 * ```typescript
 * toDirectoryName("  documents ");  // "Documents"
 * toDirectoryName("Video/");        // "Video"
 * toDirectoryName("...");           // "Other"
 * ```
 */
export function toDirectoryName(label: string): string {
  const cleaned = label
    .replace(ILLEGAL_DIRECTORY_CHARS, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[. ]+$/, "");

  if (cleaned.length === 0) {
    return FALLBACK_CATEGORY;
  }

  const canonical = matchCategory(cleaned);
  if (canonical) return canonical;

  return cleaned.charAt(0).toUpperCase() + cleaned.slice(1).toLowerCase();
}

// =============================================================================
// Plan
// =============================================================================

/**
 * One file's destination
 */
export interface PlannedMove {
  readonly entry: FileEntry;
  readonly category: Category;
  readonly directoryName: string;
  readonly destinationPath: string;
}

export class MovePlan {
  readonly targetDir: string;
  private moves = new Map<string, PlannedMove>();
  private sealed = false;

  constructor(targetDir: string) {
    this.targetDir = targetDir;
  }

  get size(): number {
    return this.moves.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Append a destination for one file. The first destination recorded for a
   * path wins; later ones are ignored.
   *
   * @returns whether the move was added
   */
  add(entry: FileEntry, category: Category): boolean {
    if (this.sealed) {
      throw new Error("Move plan is sealed; no moves can be added during execution");
    }
    if (this.moves.has(entry.path)) {
      logger.warn({ file: entry.fileName, category }, "File already has a destination, ignoring duplicate");
      return false;
    }

    const directoryName = toDirectoryName(category);
    this.moves.set(
      entry.path,
      Object.freeze({
        entry,
        category,
        directoryName,
        destinationPath: path.join(this.targetDir, directoryName, entry.fileName),
      })
    );
    return true;
  }

  /**
   * Merge one batch's reconciled result. Records line up with the batch's
   * entries one to one.
   *
   * @returns number of moves added
   */
  merge(batch: Batch, result: ClassificationResult): number {
    const byName = new Map(result.records.map((record) => [record.fileName, record.category]));
    let added = 0;

    for (const entry of batch.entries) {
      const category = byName.get(entry.fileName) ?? FALLBACK_CATEGORY;
      if (this.add(entry, category)) added++;
    }

    return added;
  }

  has(entry: FileEntry): boolean {
    return this.moves.has(entry.path);
  }

  get(entry: FileEntry): PlannedMove | undefined {
    return this.moves.get(entry.path);
  }

  /** Moves in the order they were added */
  list(): PlannedMove[] {
    return [...this.moves.values()];
  }

  /** Number of files per category, taxonomy labels only */
  countByCategory(): Map<Category, number> {
    const counts = new Map<Category, number>();
    for (const move of this.moves.values()) {
      counts.set(move.category, (counts.get(move.category) ?? 0) + 1);
    }
    return counts;
  }

  /** Freeze the plan before it is executed or previewed */
  seal(): void {
    this.sealed = true;
  }
}
