import { RateLimitError } from "./errors.js";

/**
 * `rate_limited` failures back off before the next attempt, `retryable`
 * ones are retried at once, `permanent` ones stop the loop.
 */
export type FailureClass = "rate_limited" | "retryable" | "permanent";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
  classifyFailure?: (error: unknown) => FailureClass;
}

export interface RetryAttemptState {
  attempt: number;
  delayMs: number;
  failureClass?: FailureClass;
  error?: string;
}

export function defaultFailureClassifier(error: unknown): FailureClass {
  if (error instanceof RateLimitError) {
    return "rate_limited";
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  if (message.includes("rate limit") || message.includes("429")) {
    return "rate_limited";
  }
  if (message.includes("401") || message.includes("403") || message.includes("auth")) {
    return "permanent";
  }
  return "retryable";
}

export class RetryPolicy {
  private readonly options: Required<RetryPolicyOptions>;

  constructor(options?: Partial<RetryPolicyOptions>) {
    this.options = {
      maxAttempts: Math.max(1, options?.maxAttempts ?? 3),
      baseDelayMs: options?.baseDelayMs ?? 1_000,
      maxDelayMs: options?.maxDelayMs ?? 30_000,
      backoffMultiplier: options?.backoffMultiplier ?? 2,
      classifyFailure: options?.classifyFailure ?? defaultFailureClassifier,
    };
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /** Delay before the attempt after `attempt` when it failed rate-limited. */
  delayFor(attempt: number, error?: unknown): number {
    const exponential = this.options.baseDelayMs * this.options.backoffMultiplier ** (attempt - 1);
    const hinted = error instanceof RateLimitError ? (error.retryAfterMs ?? 0) : 0;
    return Math.min(this.options.maxDelayMs, Math.max(Math.floor(exponential), hinted));
  }

  async run<T>(
    operation: (state: RetryAttemptState) => Promise<T>,
    onAttempt?: (state: RetryAttemptState) => void,
    signal?: AbortSignal,
  ): Promise<T> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      const state: RetryAttemptState = { attempt, delayMs: 0 };
      onAttempt?.(state);
      try {
        return await operation(state);
      } catch (error) {
        const failureClass = this.options.classifyFailure(error);
        state.failureClass = failureClass;
        state.error = error instanceof Error ? error.message : String(error);

        if (failureClass === "permanent" || attempt >= this.options.maxAttempts) {
          onAttempt?.(state);
          throw error;
        }
        if (failureClass === "rate_limited") {
          state.delayMs = this.delayFor(attempt, error);
        }
        onAttempt?.(state);
        await sleep(state.delayMs, signal);
      }
    }

    throw new Error("Retry policy exited unexpectedly");
  }
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  if (ms <= 0) return;
  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
