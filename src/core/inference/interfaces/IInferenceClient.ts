/**
 * Inference Client Interface
 *
 * Black-box interface for sending one batch's prompt to a completion
 * endpoint. Implementations own retries and never reject.
 */

import type { ClassificationRequest } from "../../../types/index.js";

/**
 * Lifecycle of one batch's request
 */
export type BatchState = "pending" | "sent" | "succeeded" | "failed";

/**
 * Final outcome of a batch's request. Completion text is untrusted.
 */
export type InferenceOutcome =
  | {
      status: "succeeded";
      batchId: string;
      text: string;
      attempts: number;
      durationMs: number;
    }
  | {
      status: "failed";
      batchId: string;
      reason: string;
      attempts: number;
      durationMs: number;
    };

/**
 * Observer for state transitions, used for progress display
 */
export type BatchStateListener = (batchId: string, state: BatchState, attempt: number) => void;

export interface IInferenceClient {
  /**
   * Send the request, retrying transient failures.
   * Resolves to a failed outcome instead of rejecting.
   *
   * @param signal - Aborts the in-flight attempt and stops further retries
   */
  complete(request: ClassificationRequest, signal?: AbortSignal): Promise<InferenceOutcome>;
}
