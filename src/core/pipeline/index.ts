/**
 * Pipeline Module
 *
 * @module
 */

export {
  SortCoordinator,
  createSortCoordinator,
  type SortPhase,
  type SortProgressEvent,
  type BatchReport,
  type SortRunResult,
  type SortCoordinatorOptions,
} from "./coordinator.js";
