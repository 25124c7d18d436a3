#!/usr/bin/env node

/**
 * semantic-sort CLI
 * Sorts the files of a directory into category folders by asking a language model
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { parseConflictPolicy, parseInteger, sortCommand, type SortOptions } from "./commands/sort.js";
import { createLogger } from "../utils/logger.js";
import { CancellationTokenSource } from "../utils/async.js";
import { DEFAULT_API_URL, DEFAULT_BATCH_SIZE, DEFAULT_MODEL } from "../utils/validation.js";
import { ConfigurationError } from "../core/errors.js";

const logger = createLogger("cli");
const cancellation = new CancellationTokenSource();

// Create the main program
const program = new Command();

program
  .name("semantic-sort")
  .description("Sort the files of a directory into category folders by filename")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Options
// =============================================================================

program
  .option("-t, --target-dir <dir>", "Directory to sort", ".")
  .option("-m, --model <name>", "Model identifier", DEFAULT_MODEL)
  .option("--api-url <url>", "Inference endpoint", DEFAULT_API_URL)
  .option("-b, --batch-size <n>", "Files per request", parseInteger, DEFAULT_BATCH_SIZE)
  .option("--dry-run", "Preview the moves without touching any file")
  .option("-c, --concurrency <n>", "Parallel requests", parseInteger, 2)
  .option("--max-attempts <n>", "Attempts per batch", parseInteger, 3)
  .option("--timeout <ms>", "Per-request timeout in milliseconds", parseInteger, 120_000)
  .addOption(
    new Option("--on-conflict <policy>", "What to do when the destination exists")
      .choices(["skip", "rename"])
      .argParser(parseConflictPolicy)
      .default("skip")
  )
  .option("-d, --debug", "Enable debug logging")
  .action(async () => {
    await sortCommand(program.opts<SortOptions>(), cancellation.token);
  });

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    logger.error({ err: error }, "Invalid configuration");
    console.error(chalk.red(`\nError: ${error.message}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

/**
 * First signal stops dispatching new batches; a second one exits immediately
 */
function shutdown(signal: string): void {
  if (cancellation.token.cancelled) {
    logger.warn("Forced shutdown");
    process.exit(130);
  }

  logger.info({ signal }, "Received shutdown signal");
  console.error(chalk.dim(`\nReceived ${signal}, cancelling remaining batches. Press Ctrl+C again to force exit.`));
  cancellation.cancel(`Received ${signal}`);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
