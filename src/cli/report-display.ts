/**
 * Report display helpers for the CLI
 */

import chalk from "chalk";
import * as path from "node:path";
import type { SortRunResult } from "../core/pipeline/index.js";
import type { MoveOutcome } from "../core/executor/index.js";
import { TAXONOMY } from "../core/classification/index.js";

const RULE = "─".repeat(40);

/**
 * Format duration in human readable format
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds.toFixed(0)}s`;
}

/**
 * Destination relative to the target directory, e.g. `Documents/a.pdf`
 */
export function displayDestination(targetDir: string, outcome: MoveOutcome): string {
  return path.relative(targetDir, outcome.destination);
}

function formatMove(targetDir: string, outcome: MoveOutcome): string {
  const destination = displayDestination(targetDir, outcome);
  switch (outcome.status) {
    case "planned":
      return `  ${outcome.fileName} ${chalk.dim("→")} ${chalk.cyan(destination)}`;
    case "moved":
      return `  ${chalk.green("✓")} ${outcome.fileName} ${chalk.dim("→")} ${chalk.cyan(destination)}${
        outcome.renamed ? chalk.dim(" (renamed)") : ""
      }`;
    case "conflict":
      return `  ${chalk.yellow("!")} ${outcome.fileName} ${chalk.dim("→")} ${destination} ${chalk.yellow(
        `(${outcome.error ?? "conflict"})`
      )}`;
    case "failed":
      return `  ${chalk.red("✗")} ${outcome.fileName} ${chalk.dim("→")} ${destination} ${chalk.red(
        `(${outcome.error ?? "failed"})`
      )}`;
  }
}

/**
 * Print the end-of-run report to stdout
 */
export function printReport(result: SortRunResult): void {
  const { execution, targetDir } = result;
  const outcomeCount = (outcome: string) => result.batches.filter((b) => b.outcome === outcome).length;

  console.log();
  console.log(chalk.cyan.bold(result.dryRun ? "Sort Preview (dry run)" : "Sort Complete"));
  console.log(chalk.dim(RULE));

  console.log();
  console.log(`  Target:     ${chalk.dim(targetDir)}`);
  console.log(`  Files:      ${result.scanned}`);
  console.log(
    `  Batches:    ${chalk.green(`${outcomeCount("strict")} strict`)}, ${chalk.yellow(
      `${outcomeCount("repaired")} repaired`
    )}, ${chalk.red(`${outcomeCount("failed")} failed`)}`
  );
  if (result.cancelled) {
    console.log(chalk.yellow(`  Cancelled:  ${result.skippedBatches} batch(es) not classified, files left in place`));
  }
  console.log(`  Duration:   ${formatDuration(result.durationMs)}`);

  const counts = result.plan.countByCategory();
  if (counts.size > 0) {
    console.log();
    console.log(chalk.white.bold("Categories"));
    for (const category of TAXONOMY) {
      const count = counts.get(category);
      if (count) {
        console.log(`  ${category.padEnd(12)}${count}`);
      }
    }
  }

  const failedBatches = result.batches.filter((b) => b.outcome === "failed");
  if (failedBatches.length > 0) {
    console.log();
    console.log(chalk.white.bold("Failed Batches"));
    for (const batch of failedBatches) {
      console.log(`  ${chalk.red("✗")} ${batch.batchId} ${chalk.dim(`(${batch.files} files → Other)`)}`);
      if (batch.failureReason) {
        console.log(chalk.dim(`    ${batch.failureReason}`));
      }
    }
  }

  if (execution.outcomes.length > 0) {
    console.log();
    console.log(chalk.white.bold(result.dryRun ? "Planned Moves" : "Moves"));
    for (const outcome of execution.outcomes) {
      console.log(formatMove(targetDir, outcome));
    }
  }

  console.log();
  if (result.dryRun) {
    console.log(`  ${execution.planned} move(s) planned. ${chalk.dim("Run without --dry-run to apply.")}`);
  } else {
    console.log(
      `  ${chalk.green(`${execution.moved} moved`)}, ${chalk.yellow(`${execution.conflicts} conflict(s)`)}, ${chalk.red(
        `${execution.failed} failed`
      )}`
    );
  }

  console.log();
  console.log(chalk.dim(RULE));
}
