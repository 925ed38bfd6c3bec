import type { CallOptions, ChatModel } from "./types";
import { ProviderError } from "./types";

export interface RetryConfig {
  maxAttempts: number; // default: 5
  baseDelayMs: number; // default: 1000 (1s)
  maxDelayMs: number; // default: 30_000 (30s)
  onRetry?: (attempt: number, delayMs: number, error: ProviderError) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Wrap a ChatModel with exponential backoff. Only retryable ProviderErrors
 * are retried; `retryAfterMs` raises the delay up to `maxDelayMs`.
 * The loop itself never retries, so retry policy lives here, at the caller.
 */
export function withRetry<TRequest>(model: ChatModel<TRequest>, config: Partial<RetryConfig> = {}): ChatModel<TRequest> {
  const { maxAttempts, baseDelayMs, maxDelayMs, onRetry } = { ...DEFAULT_RETRY_CONFIG, ...config };

  return {
    modelId: model.modelId,
    async call(request, tools, options: CallOptions = {}) {
      for (let attempt = 1; ; attempt++) {
        try {
          return await model.call(request, tools, options);
        } catch (err) {
          if (!(err instanceof ProviderError) || !err.isRetryable || attempt >= maxAttempts) throw err;
          if (options.signal?.aborted) throw err;

          const exponentialDelay = baseDelayMs * 2 ** (attempt - 1);
          const delayMs = Math.min(Math.max(exponentialDelay, err.retryAfterMs ?? 0), maxDelayMs);
          onRetry?.(attempt, delayMs, err);
          await sleep(delayMs, options.signal);
          if (options.signal?.aborted) {
            throw new ProviderError("Aborted during retry back-off", "unknown", false, undefined, undefined, err);
          }
        }
      }
    },
  };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
  });
}
