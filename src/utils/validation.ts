/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating the run configuration.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError, ErrorCode } from "../core/errors.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_MODEL = "gpt-oss:20b-cloud";
export const DEFAULT_API_URL = "http://localhost:11434/api/generate";
export const DEFAULT_BATCH_SIZE = 15;

/**
 * What to do when the destination path is already taken.
 * Neither policy overwrites.
 */
export const ConflictPolicySchema = z.enum(["skip", "rename"]);

export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>;

// =============================================================================
// Sorter Configuration Schema
// =============================================================================

const positiveInt = z.number().int().positive();

/**
 * Run configuration schema
 */
export const SorterConfigSchema = z.object({
  /** Directory whose immediate children are sorted */
  targetDir: z.string().min(1).default("."),

  /** Model identifier sent with every request */
  model: z.string().trim().min(1).default(DEFAULT_MODEL),

  /** Completion endpoint (Ollama /api/generate compatible) */
  apiUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" })
    .default(DEFAULT_API_URL),

  /** Files per inference request */
  batchSize: positiveInt.default(DEFAULT_BATCH_SIZE),

  /** Preview only */
  dryRun: z.boolean().default(false),

  /** Inference requests in flight at once */
  concurrency: positiveInt.max(16).default(2),

  /** Attempts per batch, including the first */
  maxAttempts: positiveInt.max(10).default(3),

  /** Per-attempt request timeout */
  requestTimeoutMs: positiveInt.default(120_000),

  /** Backoff before the second attempt; doubles each retry */
  retryInitialDelayMs: z.number().int().nonnegative().default(2_000),

  /** Backoff ceiling */
  retryMaxDelayMs: z.number().int().nonnegative().default(16_000),

  onConflict: ConflictPolicySchema.default("skip"),
});

export type SorterConfigInput = z.input<typeof SorterConfigSchema>;

export type SorterConfig = Readonly<z.output<typeof SorterConfigSchema>>;

/**
 * Validate raw options into the frozen run configuration.
 * `targetDir` is resolved against the current working directory.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function createSorterConfig(input: SorterConfigInput = {}): SorterConfig {
  const parsed = SorterConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      issues,
    });
  }

  return Object.freeze({
    ...parsed.data,
    targetDir: path.resolve(parsed.data.targetDir),
  });
}
