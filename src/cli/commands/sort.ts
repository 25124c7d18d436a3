/**
 * sort command - Classify the files of a directory and move them into category folders
 */

import chalk from "chalk";
import ora from "ora";
import { InvalidArgumentError } from "commander";
import { createLogger, setLogLevel } from "../../utils/logger.js";
import { isDirectory } from "../../utils/fs.js";
import {
  ConflictPolicySchema,
  createSorterConfig,
  type ConflictPolicy,
  type SorterConfig,
} from "../../utils/validation.js";
import type { CancellationToken } from "../../utils/async.js";
import { ConfigurationError, ErrorCode } from "../../core/errors.js";
import { createSortCoordinator, type SortRunResult } from "../../core/pipeline/index.js";
import { printReport } from "../report-display.js";

const logger = createLogger("sort");

/** Exit code for a run in which at least one move failed */
export const EXIT_MOVE_FAILURES = 2;

/**
 * Parsed CLI options, as read back through `program.opts()`
 */
export type SortOptions = {
  targetDir: string;
  model: string;
  apiUrl: string;
  batchSize: number;
  dryRun?: boolean;
  concurrency: number;
  maxAttempts: number;
  timeout: number;
  onConflict: ConflictPolicy;
  debug?: boolean;
};

// =============================================================================
// Argument Parsers
// =============================================================================

/**
 * commander argument parser for integer options
 */
export function parseInteger(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

/**
 * commander argument parser for --on-conflict
 */
export function parseConflictPolicy(value: string): ConflictPolicy {
  const parsed = ConflictPolicySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of ${ConflictPolicySchema.options.join(", ")}.`);
  }
  return parsed.data;
}

/**
 * Map CLI options onto a validated configuration
 */
export function toSorterConfig(options: SortOptions): SorterConfig {
  return createSorterConfig({
    targetDir: options.targetDir,
    model: options.model,
    apiUrl: options.apiUrl,
    batchSize: options.batchSize,
    dryRun: options.dryRun ?? false,
    concurrency: options.concurrency,
    maxAttempts: options.maxAttempts,
    requestTimeoutMs: options.timeout,
    onConflict: options.onConflict,
  });
}

// =============================================================================
// Command
// =============================================================================

/**
 * Scan, classify and sort (or preview) the target directory
 */
export async function sortCommand(options: SortOptions, cancellation?: CancellationToken): Promise<SortRunResult> {
  if (options.debug) {
    setLogLevel("debug");
  }

  const config = toSorterConfig(options);
  logger.info({ config }, "Starting sort");

  if (!(await isDirectory(config.targetDir))) {
    throw new ConfigurationError(
      `Target directory does not exist or is not a directory: ${config.targetDir}`,
      ErrorCode.CONFIG_TARGET_NOT_FOUND,
      { targetDir: config.targetDir }
    );
  }

  const spinner = ora("Scanning...").start();
  const stopListening = cancellation?.onCancel(() => {
    spinner.text = "Cancelling, waiting for in-flight batches...";
  });

  const coordinator = createSortCoordinator({
    config,
    cancellation,
    onProgress: (event) => {
      if (cancellation?.cancelled) return;
      switch (event.phase) {
        case "scanning":
          spinner.text = event.message;
          break;
        case "classifying":
          spinner.text = `Classifying batches ${event.processed}/${event.total} (${event.percentage}%)`;
          break;
        case "executing":
          spinner.text = `${config.dryRun ? "Planning" : "Moving"} ${event.processed}/${event.total}`;
          break;
        case "complete":
          break;
      }
    },
  });

  let result: SortRunResult;
  try {
    result = await coordinator.run();
  } catch (error) {
    spinner.fail(chalk.red("Sort failed"));
    throw error;
  } finally {
    stopListening?.();
  }

  if (result.cancelled) {
    spinner.warn(chalk.yellow("Sort cancelled, partial results below"));
  } else if (result.scanned === 0) {
    spinner.info("No files to sort");
  } else {
    spinner.succeed(chalk.green(`Classified ${result.scanned} file(s)`));
  }

  printReport(result);

  if (result.execution.failed > 0) {
    process.exitCode = EXIT_MOVE_FAILURES;
  }

  logger.info(
    { moved: result.execution.moved, conflicts: result.execution.conflicts, failed: result.execution.failed },
    "Sort finished"
  );

  return result;
}
