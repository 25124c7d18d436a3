/**
 * Shared types for semantic-sort
 */

// =============================================================================
// File Entities
// =============================================================================

/**
 * A file found directly under the target directory
 */
export interface FileEntry {
  /** Absolute path */
  readonly path: string;
  /** Name exactly as the filesystem returned it */
  readonly fileName: string;
  /** Lower-cased extension including the dot, "" when absent */
  readonly extension: string;
}

// =============================================================================
// Batching
// =============================================================================

/**
 * Files classified together in one inference request
 */
export interface Batch {
  /** Correlation id, stable for the same position and filenames */
  readonly id: string;
  /** Zero-based position in the run */
  readonly index: number;
  readonly entries: readonly FileEntry[];
}

// =============================================================================
// Inference
// =============================================================================

/**
 * One rendered completion request
 */
export interface ClassificationRequest {
  readonly batchId: string;
  readonly prompt: string;
  readonly model: string;
  readonly apiUrl: string;
}

export type { Result } from "./result.js";
