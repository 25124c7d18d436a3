/**
 * Batching Module
 *
 * @module
 */

export { planBatches, createBatchId } from "./batch-planner.js";
