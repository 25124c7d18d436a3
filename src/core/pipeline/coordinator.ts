/**
 * Sort Coordinator
 *
 * Orchestrates one run: Scan → Batch → Prompt → Infer → Reconcile → Execute.
 * Inference runs with bounded concurrency; results are merged into the move
 * plan in batch order once every dispatched batch has returned.
 *
 * @module
 */

import type { Batch, FileEntry } from "../../types/index.js";
import type { SorterConfig } from "../../utils/validation.js";
import type {
  BatchStateListener,
  IInferenceClient,
  InferenceOutcome,
} from "../inference/interfaces/IInferenceClient.js";
import type { ClassificationResult, ParseOutcome } from "../classification/models/classification.js";
import { FALLBACK_CATEGORY } from "../classification/models/classification.js";
import { scanDirectory } from "../scanner/scanner.js";
import { planBatches } from "../batching/batch-planner.js";
import { buildClassificationRequest } from "../prompts/classification-prompt.js";
import { createInferenceClient } from "../inference/impl/OllamaInferenceClient.js";
import { parseCompletion, reconcileBatch } from "../classification/response-reconciler.js";
import { MovePlan } from "../executor/move-plan.js";
import { executePlan, type ExecutionReport, type MoveOutcome } from "../executor/plan-executor.js";
import { mapConcurrent, type CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { wrapError } from "../errors.js";

const logger = createLogger("sort-coordinator");

// =============================================================================
// Types
// =============================================================================

export type SortPhase = "scanning" | "classifying" | "executing" | "complete";

/**
 * Progress event for a run
 */
export interface SortProgressEvent {
  phase: SortPhase;
  /** Items finished in the current phase */
  processed: number;
  /** Items in the current phase */
  total: number;
  /** Percentage of the current phase (0-100) */
  percentage: number;
  message: string;
}

/**
 * What happened to one batch
 */
export interface BatchReport {
  batchId: string;
  files: number;
  outcome: ParseOutcome;
  attempts: number;
  durationMs: number;
  /** Files that fell back to Other because the model skipped them */
  fallbacks: number;
  unmatched: string[];
  failureReason?: string;
}

export interface SortRunResult {
  targetDir: string;
  dryRun: boolean;
  /** Files found by the scanner */
  scanned: number;
  batches: BatchReport[];
  /** Batches never classified because the run was cancelled */
  skippedBatches: number;
  cancelled: boolean;
  plan: MovePlan;
  execution: ExecutionReport;
  durationMs: number;
}

export interface SortCoordinatorOptions {
  config: SorterConfig;
  /** Defaults to an Ollama client built from `config` */
  client?: IInferenceClient;
  /** Cancelling stops new batches from being dispatched */
  cancellation?: CancellationToken;
  onProgress?: (event: SortProgressEvent) => void;
  /** Forwarded to the default client */
  onBatchState?: BatchStateListener;
  onMove?: (outcome: MoveOutcome, index: number, total: number) => void;
}

interface ClassifiedBatch {
  batch: Batch;
  outcome: InferenceOutcome;
  result: ClassificationResult;
}

// =============================================================================
// SortCoordinator Implementation
// =============================================================================

/**
 * Runs the whole pipeline for one target directory.
 *
 * @example
 * ```typescript
 * const coordinator = new SortCoordinator({
 *   config: createSorterConfig({ targetDir: "~/Downloads", dryRun: true }),
 *   onProgress: (event) => console.log(`${event.phase}: ${event.percentage}%`),
 * });
 * const result = await coordinator.run();
 * ```
 */
export class SortCoordinator {
  private config: SorterConfig;
  private client: IInferenceClient;
  private cancellation?: CancellationToken;
  private options: SortCoordinatorOptions;

  constructor(options: SortCoordinatorOptions) {
    this.options = options;
    this.config = options.config;
    this.cancellation = options.cancellation;
    this.client =
      options.client ??
      createInferenceClient({
        maxAttempts: options.config.maxAttempts,
        requestTimeoutMs: options.config.requestTimeoutMs,
        retryInitialDelayMs: options.config.retryInitialDelayMs,
        retryMaxDelayMs: options.config.retryMaxDelayMs,
        onStateChange: options.onBatchState,
        acceptCompletion: (text) => parseCompletion(text).outcome !== "failed",
      });
  }

  /**
   * Scan, classify and preview or apply. Only a failed scan rejects.
   */
  async run(): Promise<SortRunResult> {
    const startTime = Date.now();
    const { config } = this;

    logger.info(
      { targetDir: config.targetDir, model: config.model, batchSize: config.batchSize, dryRun: config.dryRun },
      "Starting sort run"
    );

    this.emit("scanning", 0, 1, "Scanning target directory...");
    const entries = await scanDirectory(config);
    this.emit("scanning", 1, 1, `Found ${entries.length} file(s)`);

    const batches = planBatches(entries, config.batchSize);
    const classified = await this.classifyAll(batches);

    const plan = new MovePlan(config.targetDir);
    for (const item of classified) {
      plan.merge(item.batch, item.result);
    }

    const cancelled = this.cancellation?.cancelled ?? false;
    if (!cancelled) {
      this.ensureCoverage(plan, entries);
    }

    this.emit("executing", 0, plan.size, config.dryRun ? "Previewing moves..." : "Moving files...");
    const execution = await executePlan(plan, config, {
      onMove: (outcome, index, total) => {
        this.emit("executing", index + 1, total, `${outcome.fileName} → ${outcome.category}`);
        this.options.onMove?.(outcome, index, total);
      },
    });
    this.emit("complete", 1, 1, "Done");

    const result: SortRunResult = {
      targetDir: config.targetDir,
      dryRun: config.dryRun,
      scanned: entries.length,
      batches: classified.map(toBatchReport),
      skippedBatches: batches.length - classified.length,
      cancelled,
      plan,
      execution,
      durationMs: Date.now() - startTime,
    };

    logger.info(
      {
        scanned: result.scanned,
        batches: result.batches.length,
        skippedBatches: result.skippedBatches,
        cancelled,
        durationMs: result.durationMs,
      },
      "Sort run complete"
    );

    return result;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async classifyAll(batches: Batch[]): Promise<ClassifiedBatch[]> {
    const signal = this.cancellation?.toAbortSignal();
    let finished = 0;

    this.emit("classifying", 0, batches.length, `Classifying ${batches.length} batch(es)...`);

    const classified = await mapConcurrent(
      batches,
      async (batch): Promise<ClassifiedBatch | null> => {
        if (this.cancellation?.cancelled) {
          return null;
        }

        const request = buildClassificationRequest(batch, this.config);
        const outcome = await this.client.complete(request, signal).catch(
          (error: unknown): InferenceOutcome => ({
            status: "failed",
            batchId: batch.id,
            reason: wrapError(error, "Inference client failed").message,
            attempts: 0,
            durationMs: 0,
          })
        );

        // Aborted by cancellation: leave the files where they are
        if (outcome.status === "failed" && this.cancellation?.cancelled) {
          logger.info({ batchId: batch.id }, "Batch interrupted by cancellation, skipping");
          return null;
        }

        const result = reconcileBatch(batch, outcome);
        finished++;
        this.emit("classifying", finished, batches.length, `Classified ${batch.id} (${result.outcome})`);
        return { batch, outcome, result };
      },
      this.config.concurrency
    );

    return classified.filter((item): item is ClassifiedBatch => item !== null);
  }

  /**
   * Every scanned file must have a destination. Reconciliation guarantees it
   * per batch; this closes any gap left between batches.
   */
  private ensureCoverage(plan: MovePlan, entries: FileEntry[]): void {
    for (const entry of entries) {
      if (!plan.has(entry)) {
        logger.error({ file: entry.fileName }, "File missing from plan, assigning fallback category");
        plan.add(entry, FALLBACK_CATEGORY);
      }
    }
  }

  private emit(phase: SortPhase, processed: number, total: number, message: string): void {
    this.options.onProgress?.({
      phase,
      processed,
      total,
      percentage: total === 0 ? 100 : Math.round((processed / total) * 100),
      message,
    });
  }
}

function toBatchReport(item: ClassifiedBatch): BatchReport {
  const { batch, outcome, result } = item;
  return {
    batchId: batch.id,
    files: batch.entries.length,
    outcome: result.outcome,
    attempts: outcome.attempts,
    durationMs: outcome.durationMs,
    fallbacks: result.records.filter((record) => record.source === "fallback").length,
    unmatched: result.unmatched,
    failureReason: result.failureReason,
  };
}

/**
 * Factory function
 */
export function createSortCoordinator(options: SortCoordinatorOptions): SortCoordinator {
  return new SortCoordinator(options);
}
