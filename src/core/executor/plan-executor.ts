/**
 * Plan Executor
 *
 * Previews or applies a sealed MovePlan. Each move stands alone: a failure
 * or a taken destination is recorded and the remaining moves proceed.
 * Existing files are never overwritten.
 *
 * @module
 */

import * as path from "node:path";
import type { Category } from "../classification/models/classification.js";
import type { MovePlan, PlannedMove } from "./move-plan.js";
import type { ConflictPolicy, SorterConfig } from "../../utils/validation.js";
import {
  ensureDirectory,
  isErrnoException,
  moveFileNoOverwrite,
  pathExists,
  splitExtension,
} from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { ErrorCode, FileSystemError, errorMessage } from "../errors.js";

const logger = createLogger("plan-executor");

/** Highest suffix tried by the rename policy before giving up */
const MAX_RENAME_SUFFIX = 999;

// =============================================================================
// Types
// =============================================================================

/**
 * - planned: dry run, nothing touched
 * - moved: file now lives at `destination`
 * - conflict: destination taken, file left in place
 * - failed: mkdir or rename raised an error, file left in place
 */
export type MoveStatus = "planned" | "moved" | "conflict" | "failed";

export interface MoveOutcome {
  source: string;
  destination: string;
  fileName: string;
  category: Category;
  status: MoveStatus;
  /** Set when the rename policy picked a free name */
  renamed?: boolean;
  error?: string;
  /** Set for conflicts and failures */
  code?: ErrorCode;
}

export interface ExecutionReport {
  dryRun: boolean;
  outcomes: MoveOutcome[];
  planned: number;
  moved: number;
  conflicts: number;
  failed: number;
  /** Category folders created by this run */
  createdDirectories: string[];
}

export interface ExecutePlanOptions {
  /** Called after each move, for progress display */
  onMove?: (outcome: MoveOutcome, index: number, total: number) => void;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Preview or apply the plan, depending on `config.dryRun`.
 *
 * @example
 * ```typescript
 * plan.seal();
 * const report = await executePlan(plan, config);
 * console.log(`${report.moved} moved, ${report.conflicts} conflicts`);
 * ```
 */
export async function executePlan(
  plan: MovePlan,
  config: Pick<SorterConfig, "dryRun" | "onConflict">,
  options: ExecutePlanOptions = {}
): Promise<ExecutionReport> {
  plan.seal();
  const moves = plan.list();
  const outcomes: MoveOutcome[] = [];
  const createdDirectories: string[] = [];
  const directoryErrors = new Map<string, FileSystemError>();
  const readyDirectories = new Set<string>();

  for (const [index, move] of moves.entries()) {
    let outcome: MoveOutcome;

    if (config.dryRun) {
      outcome = toOutcome(move, "planned");
    } else {
      const directory = path.dirname(move.destinationPath);
      if (!readyDirectories.has(directory) && !directoryErrors.has(directory)) {
        await prepareDirectory(directory, readyDirectories, directoryErrors, createdDirectories);
      }

      const directoryError = directoryErrors.get(directory);
      outcome = directoryError
        ? toOutcome(move, "failed", { error: directoryError.message, code: directoryError.code })
        : await applyMove(move, config.onConflict);
    }

    outcomes.push(outcome);
    options.onMove?.(outcome, index, moves.length);
  }

  const count = (status: MoveStatus) => outcomes.filter((o) => o.status === status).length;
  const report: ExecutionReport = {
    dryRun: config.dryRun,
    outcomes,
    planned: count("planned"),
    moved: count("moved"),
    conflicts: count("conflict"),
    failed: count("failed"),
    createdDirectories,
  };

  logger.info(
    {
      dryRun: report.dryRun,
      planned: report.planned,
      moved: report.moved,
      conflicts: report.conflicts,
      failed: report.failed,
    },
    "Plan executed"
  );

  return report;
}

async function prepareDirectory(
  directory: string,
  ready: Set<string>,
  errors: Map<string, FileSystemError>,
  created: string[]
): Promise<void> {
  try {
    const existed = await pathExists(directory);
    await ensureDirectory(directory);
    ready.add(directory);
    if (!existed) created.push(directory);
  } catch (error) {
    const fsError = new FileSystemError(
      `Could not create ${directory}: ${errorMessage(error)}`,
      ErrorCode.FS_MKDIR_FAILED,
      { filePath: directory }
    );
    logger.error({ err: fsError }, "Failed to create category directory");
    errors.set(directory, fsError);
  }
}

async function applyMove(move: PlannedMove, policy: ConflictPolicy): Promise<MoveOutcome> {
  const source = move.entry.path;

  try {
    await moveFileNoOverwrite(source, move.destinationPath);
    logger.debug({ file: move.entry.fileName, category: move.category }, "Moved file");
    return toOutcome(move, "moved");
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EEXIST") {
      return moveFailed(move, error);
    }
  }

  if (policy === "skip") {
    logger.warn({ file: move.entry.fileName, destination: move.destinationPath }, "Destination exists, skipping");
    return toOutcome(move, "conflict", {
      error: "destination already exists",
      code: ErrorCode.FS_DESTINATION_EXISTS,
    });
  }

  return applyRenamedMove(move);
}

/**
 * Move to the first free `name (n).ext` beside the taken destination
 */
async function applyRenamedMove(move: PlannedMove): Promise<MoveOutcome> {
  const directory = path.dirname(move.destinationPath);
  const { base, extension } = splitExtension(move.entry.fileName);

  for (let suffix = 1; suffix <= MAX_RENAME_SUFFIX; suffix++) {
    const candidate = path.join(directory, `${base} (${suffix})${extension}`);
    try {
      await moveFileNoOverwrite(move.entry.path, candidate);
      logger.debug({ file: move.entry.fileName, destination: candidate }, "Moved file under a new name");
      return toOutcome(move, "moved", { destination: candidate, renamed: true });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        return moveFailed(move, error);
      }
    }
  }

  return toOutcome(move, "conflict", {
    error: `no free name up to (${MAX_RENAME_SUFFIX})`,
    code: ErrorCode.FS_DESTINATION_EXISTS,
  });
}

function moveFailed(move: PlannedMove, cause: unknown): MoveOutcome {
  const error = new FileSystemError(errorMessage(cause), ErrorCode.FS_MOVE_FAILED, {
    filePath: move.entry.path,
    destination: move.destinationPath,
  });
  logger.error({ err: error, file: move.entry.fileName }, "Failed to move file");
  return toOutcome(move, "failed", { error: error.message, code: error.code });
}

function toOutcome(
  move: PlannedMove,
  status: MoveStatus,
  extra: Partial<Pick<MoveOutcome, "destination" | "renamed" | "error" | "code">> = {}
): MoveOutcome {
  return {
    source: move.entry.path,
    destination: move.destinationPath,
    fileName: move.entry.fileName,
    category: move.category,
    status,
    ...extra,
  };
}
