/**
 * Classification Module
 *
 * Fixed taxonomy plus reconciliation of model output back onto the batch.
 *
 * @module
 */

// Models
export * from "./models/classification.js";

// Reconciliation
export {
  reconcileBatch,
  parseCompletion,
  repairCompletion,
  salvagePairs,
  extractEntries,
  type ParsedEntry,
  type ParsedCompletion,
} from "./response-reconciler.js";
