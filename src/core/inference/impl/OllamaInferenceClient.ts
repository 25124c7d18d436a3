/**
 * Ollama Inference Client
 *
 * Sends classification prompts to an Ollama-compatible /api/generate
 * endpoint with per-attempt timeouts and exponential backoff. A batch that
 * keeps failing resolves to a failed outcome; nothing is thrown to the caller.
 */

import { z } from "zod";
import type { ClassificationRequest } from "../../../types/index.js";
import type {
  BatchState,
  BatchStateListener,
  IInferenceClient,
  InferenceOutcome,
} from "../interfaces/IInferenceClient.js";
import { retry } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";
import { ErrorCode, InferenceError, errorMessage } from "../../errors.js";

const logger = createLogger("inference-client");

// =============================================================================
// Wire Format
// =============================================================================

/**
 * Request body for /api/generate with streaming disabled
 */
export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  format: "json";
}

/**
 * The only field we rely on; everything else Ollama sends is ignored
 */
const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
});

// =============================================================================
// Configuration
// =============================================================================

export interface OllamaInferenceClientConfig {
  /** Attempts per batch, including the first */
  maxAttempts: number;
  /** Timeout for a single HTTP attempt */
  requestTimeoutMs: number;
  /** Delay before the first retry */
  retryInitialDelayMs: number;
  /** Delay ceiling */
  retryMaxDelayMs: number;
  /** Replaceable transport, mainly for tests */
  fetch?: typeof fetch;
  onStateChange?: BatchStateListener;
  /** Completions this rejects are retried like a transport failure */
  acceptCompletion?: (text: string) => boolean;
}

/**
 * A completion with nothing that could hold a JSON object or array
 */
function isDegenerate(text: string): boolean {
  return text.trim().length === 0 || !/[{[]/.test(text);
}

// =============================================================================
// Implementation
// =============================================================================

export class OllamaInferenceClient implements IInferenceClient {
  private config: OllamaInferenceClientConfig;
  private fetchImpl: typeof fetch;

  constructor(config: OllamaInferenceClientConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async complete(request: ClassificationRequest, signal?: AbortSignal): Promise<InferenceOutcome> {
    const startTime = Date.now();
    const { batchId } = request;
    let attempts = 0;

    this.transition(batchId, "pending", 0);

    try {
      const text = await retry(
        async (attempt) => {
          attempts = attempt;
          if (signal?.aborted) {
            throw new InferenceError("Run cancelled before request", ErrorCode.INFERENCE_CANCELLED, {
              batchId,
            });
          }
          this.transition(batchId, "sent", attempt);
          return this.send(request, signal);
        },
        {
          maxAttempts: this.config.maxAttempts,
          initialDelayMs: this.config.retryInitialDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          backoffFactor: 2,
          signal,
          retryIf: (error) =>
            !signal?.aborted &&
            !(error instanceof InferenceError && error.code === ErrorCode.INFERENCE_CANCELLED),
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { batchId, attempt, maxAttempts: this.config.maxAttempts, delayMs, err: error },
              "Inference attempt %d/%d failed for %s, retrying in %dms",
              attempt,
              this.config.maxAttempts,
              batchId,
              delayMs
            );
          },
        }
      );

      this.transition(batchId, "succeeded", attempts);
      return { status: "succeeded", batchId, text, attempts, durationMs: Date.now() - startTime };
    } catch (error) {
      const reason = errorMessage(error);
      logger.error(
        { batchId, attempts, err: error },
        "Batch %s failed after %d attempt(s): %s",
        batchId,
        attempts,
        reason
      );
      this.transition(batchId, "failed", attempts);
      return { status: "failed", batchId, reason, attempts, durationMs: Date.now() - startTime };
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * One HTTP attempt. Every failure surfaces as an InferenceError.
   */
  private async send(request: ClassificationRequest, signal?: AbortSignal): Promise<string> {
    const { batchId } = request;
    const timeoutSignal = AbortSignal.timeout(this.config.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    const body: OllamaGenerateRequest = {
      model: request.model,
      prompt: request.prompt,
      stream: false,
      format: "json",
    };

    let response: Response;
    try {
      response = await this.fetchImpl(request.apiUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: combined,
      });
    } catch (error) {
      throw this.transportError(error, batchId, signal, timeoutSignal);
    }

    if (!response.ok) {
      const detail = await response.text().catch((error: unknown) => errorMessage(error));
      throw new InferenceError(
        `Endpoint returned ${response.status}: ${detail.slice(0, 200)}`,
        ErrorCode.INFERENCE_HTTP_ERROR,
        { batchId, status: response.status }
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (signal?.aborted || timeoutSignal.aborted) {
        throw this.transportError(error, batchId, signal, timeoutSignal);
      }
      throw new InferenceError(
        `Response body is not JSON: ${errorMessage(error)}`,
        ErrorCode.INFERENCE_INVALID_RESPONSE,
        { batchId }
      );
    }

    const parsed = OllamaGenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError(
        "Response body has no string 'response' field",
        ErrorCode.INFERENCE_INVALID_RESPONSE,
        { batchId }
      );
    }

    const text = parsed.data.response;
    if (isDegenerate(text)) {
      throw new InferenceError("Model returned an empty or degenerate completion", ErrorCode.INFERENCE_EMPTY_RESPONSE, {
        batchId,
        completion: text.slice(0, 200),
      });
    }

    if (this.config.acceptCompletion && !this.config.acceptCompletion(text)) {
      throw new InferenceError("Model returned a completion that does not parse", ErrorCode.INFERENCE_INVALID_RESPONSE, {
        batchId,
        completion: text.slice(0, 200),
      });
    }

    logger.debug({ batchId, length: text.length }, "Received completion");
    return text;
  }

  private transportError(
    error: unknown,
    batchId: string,
    signal: AbortSignal | undefined,
    timeoutSignal: AbortSignal
  ): InferenceError {
    if (signal?.aborted) {
      return new InferenceError("Request cancelled", ErrorCode.INFERENCE_CANCELLED, { batchId });
    }
    if (timeoutSignal.aborted) {
      return new InferenceError(
        `Request timed out after ${this.config.requestTimeoutMs}ms`,
        ErrorCode.INFERENCE_TIMEOUT,
        { batchId }
      );
    }
    return new InferenceError(`Connection failed: ${errorMessage(error)}`, ErrorCode.INFERENCE_CONNECTION_FAILED, {
      batchId,
    });
  }

  private transition(batchId: string, state: BatchState, attempt: number): void {
    logger.trace({ batchId, state, attempt }, "Batch state changed");
    this.config.onStateChange?.(batchId, state, attempt);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an inference client from the run configuration
 */
export function createInferenceClient(
  config: OllamaInferenceClientConfig
): OllamaInferenceClient {
  return new OllamaInferenceClient(config);
}
