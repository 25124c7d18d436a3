/**
 * Classification Models
 *
 * The fixed category taxonomy and the records produced when a batch of
 * filenames is classified.
 */

import { z } from "zod";

// =============================================================================
// Taxonomy
// =============================================================================

/**
 * The closed set of category labels. Also the names of the folders
 * created under the target directory.
 */
export const CategorySchema = z.enum([
  "Documents",
  "Images",
  "Music",
  "Video",
  "Code",
  "Archives",
  "Other",
]);

export type Category = z.infer<typeof CategorySchema>;

export const TAXONOMY: readonly Category[] = CategorySchema.options;

export const FALLBACK_CATEGORY: Category = "Other";

const CATEGORY_BY_LOWERCASE = new Map<string, Category>(
  TAXONOMY.map((category) => [category.toLowerCase(), category])
);

/**
 * Canonical taxonomy label for a case-insensitive match, or null
 */
export function matchCategory(label: string): Category | null {
  return CATEGORY_BY_LOWERCASE.get(label.trim().toLowerCase()) ?? null;
}

/**
 * Any value a model returned, coerced into the taxonomy
 */
export function coerceCategory(value: unknown): Category {
  if (typeof value !== "string") return FALLBACK_CATEGORY;
  return matchCategory(value) ?? FALLBACK_CATEGORY;
}

/**
 * Whether a directory entry name collides with a category folder
 */
export function isCategoryName(name: string): boolean {
  return CATEGORY_BY_LOWERCASE.has(name.toLowerCase());
}

// =============================================================================
// Records and Results
// =============================================================================

/**
 * Where a record's label came from
 * - model: returned by the model and already in the taxonomy
 * - coerced: returned by the model but outside the taxonomy, collapsed to Other
 * - fallback: the model said nothing usable about this file
 */
export type RecordSource = "model" | "coerced" | "fallback";

/**
 * One filename-to-category decision
 */
export interface ClassificationRecord {
  fileName: string;
  category: Category;
  source: RecordSource;
}

/**
 * How the completion text was turned into records
 */
export type ParseOutcome = "strict" | "repaired" | "failed";

/**
 * Per-batch result. `records` holds exactly one entry per file of the
 * batch, in batch order.
 */
export interface ClassificationResult {
  batchId: string;
  outcome: ParseOutcome;
  records: ClassificationRecord[];
  /** Keys the model returned that match no file of the batch */
  unmatched: string[];
  /** Why the batch fell back entirely, when outcome is "failed" */
  failureReason?: string;
}
