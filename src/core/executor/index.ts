/**
 * Executor Module
 *
 * Builds the move plan and previews or applies it.
 *
 * @module
 */

export { MovePlan, toDirectoryName, type PlannedMove } from "./move-plan.js";
export {
  executePlan,
  type MoveStatus,
  type MoveOutcome,
  type ExecutionReport,
  type ExecutePlanOptions,
} from "./plan-executor.js";
