import type { Logger } from '@logkb/shared';

/**
 * Configuration options for retry behavior on provider API requests.
 *
 * Fields mirror `embeddings.retry` in the configuration file. Unset fields
 * fall back to the defaults in `executeProviderRequest`.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed along with each provider request.
 */
export interface RequestContext {
  /** Identifier of the build or query issuing the request */
  runId: string;
  logger: Logger;
  /** Cancels the request and suppresses further retries */
  abortSignal?: AbortSignal;
  /** Time budget for a single provider call, not for the whole operation */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
