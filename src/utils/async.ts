/**
 * Async Utility Functions
 *
 * Provides common async patterns: sleeping, retries with backoff,
 * bounded concurrency and cancellation support.
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration,
 * or as soon as `signal` aborts.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  /** Optional predicate to determine if error is retryable */
  retryIf?: (error: unknown) => boolean;
  /** Optional callback before each retry, with the delay about to be waited */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting ends the backoff wait and rethrows the last error */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Retries a function with exponential backoff.
 *
 * @param fn - The async function to retry; receives the 1-based attempt number
 * @param options - Retry configuration options
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        throw error;
      }

      opts.onRetry?.(error, attempt, delay);

      await sleep(delay, opts.signal);
      if (opts.signal?.aborted) {
        throw error;
      }
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw lastError;
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /** The reason for cancellation (if any) */
  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Cancels the token, notifying all listeners.
   */
  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      this.listeners.forEach((fn) => fn());
      this.listeners = [];
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Bridges the token to an AbortSignal for fetch and friends.
   */
  toAbortSignal(): AbortSignal {
    const controller = new AbortController();
    this.onCancel(() => controller.abort(this._reason ?? "Operation cancelled"));
    return controller.signal;
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs promises in parallel with a concurrency limit.
 * Results keep the order of `items`.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 */
export async function mapConcurrent<T, U>(
  items: T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await fn(items[index]!, index);
    }
  }

  const workers = Array(Math.max(1, Math.min(concurrency, items.length)))
    .fill(null)
    .map(() => worker());

  await Promise.all(workers);
  return results;
}
