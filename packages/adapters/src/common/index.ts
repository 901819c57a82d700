import { ConfigError, RateLimitError, TimeoutError, eventMeta } from '@logkb/shared';
import type { RequestContext, RetryOptions } from '../types';

/**
 * Default retry options for provider API requests.
 *
 * ## Retry Strategy
 *
 * Exponential backoff with jitter:
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 *
 * A `RateLimitError` carrying `retryAfter` (seconds) waits at least that long,
 * still capped at `maxDelayMs`.
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED, EAI_AGAIN)
 *
 * `ConfigError` (HTTP 401/403), other 4xx responses and caller cancellation
 * fail immediately.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const NETWORK_ERROR_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN']);

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return codeOf(error.cause);
  return undefined;
}

/**
 * Determines if an error is transient and the request is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = codeOf(error);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

function backoffDelay(attempt: number, error: unknown, options: Required<RetryOptions>): number {
  const { initialDelayMs, maxDelayMs, backoffFactor } = options;
  const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempt - 1));
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  const withJitter = Math.max(0, delay + jitter);
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.min(maxDelayMs, Math.max(withJitter, error.retryAfter * 1000));
  }
  return withJitter;
}

function rejectOnAbort(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let dispose = () => {};
  const promise = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    dispose = () => signal.removeEventListener('abort', onAbort);
  });
  return { promise, dispose };
}

/**
 * Executes a provider request with retry, a per-call timeout and abort handling.
 *
 * The request is raced against its abort signal, so a timeout takes effect even
 * when the underlying client ignores the signal.
 *
 * ```typescript
 * const vectors = await executeProviderRequest(
 *   ctx,
 *   'openai',
 *   'text-embedding-3-small',
 *   (signal) => embedder.embedTexts(batch, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: RequestContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    ...eventMeta(ctx.runId),
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => abortController.abort(ctx.abortSignal?.reason);

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort(ctx.abortSignal.reason);
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    const aborted = rejectOnAbort(abortController.signal);
    const cleanup = () => {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
      aborted.dispose();
    };
    // Observed through the race below.
    aborted.promise.catch(() => undefined);

    try {
      const result = await Promise.race([requestFn(abortController.signal), aborted.promise]);
      cleanup();

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        ...eventMeta(ctx.runId),
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      cleanup();
      lastError = error;

      if (ctx.abortSignal?.aborted) {
        break;
      }

      if (error instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(error) || attempts >= options.maxRetries) {
        break;
      }

      attempts++;
      const delay = backoffDelay(attempts, error, options);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    ...eventMeta(ctx.runId),
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
