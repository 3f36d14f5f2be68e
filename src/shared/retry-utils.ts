/**
 * Retry Utilities
 * Provides configurable retry logic with exponential backoff for handling transient errors
 */

import { logger } from '@/config/logger.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  retryableErrors?: (error: unknown) => boolean;
  /** Aborting stops the retry loop, including a pending backoff wait */
  signal?: AbortSignal;
}

/**
 * Default retry configuration
 */
const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxAttempts: 3,
  baseDelayMs: 1500,
  maxDelayMs: 30000,
  jitterMs: 250,
  retryableErrors: isTransientError,
};

const RETRYABLE_STATUSES = [
  408, // Request Timeout
  429, // Too Many Requests (Rate Limit)
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

const RETRYABLE_ERROR_CODES = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'rate_limit_exceeded',
  'server_error',
  'timeout',
];

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /connection reset/i,
  /ECONNRESET/i,
  /rate limit/i,
  /too many requests/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

const SAFETY_ERROR_CODES = [
  'moderation_blocked',
  'content_policy_violation',
  'IMAGE_SAFETY_BLOCKED',
  'PROHIBITED_CONTENT',
  'SAFETY',
  'BLOCKLIST',
  'IMAGE_SAFETY',
  'BLOCK_REASON_UNSPECIFIED',
];

const SAFETY_PATTERNS = [
  /safety system/i,
  /moderation/i,
  /content policy/i,
  /prohibited content/i,
  /safety.*blocked/i,
  /prompt blocked/i,
];

function readErrorFields(error: object): { status: unknown; code: unknown; message: unknown } {
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  const code = 'code' in error ? error.code : undefined;
  const message = 'message' in error ? error.message : undefined;
  return { status: status ?? code, code, message };
}

/**
 * Determine if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if (error instanceof Error && error.name === 'AbortError') return false;

  const { status, code, message } = readErrorFields(error);

  if (typeof status === 'number' && RETRYABLE_STATUSES.includes(status)) {
    return true;
  }

  if (typeof code === 'string' && RETRYABLE_ERROR_CODES.includes(code)) {
    return true;
  }

  if (typeof message === 'string' && TRANSIENT_PATTERNS.some((pattern) => pattern.test(message))) {
    return true;
  }

  return false;
}

/**
 * Determine if an error is a safety/moderation block (non-retryable)
 */
export function isSafetyBlockError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  const { status, code, message } = readErrorFields(error);

  if (status === 422) {
    return true;
  }

  if (typeof code === 'string' && SAFETY_ERROR_CODES.includes(code)) {
    return true;
  }

  if (typeof message === 'string' && SAFETY_PATTERNS.some((pattern) => pattern.test(message))) {
    return true;
  }

  return false;
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number,
): number {
  // Exponential backoff: baseDelay * 2^(attempt - 1)
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);

  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  // Add random jitter: +/- jitterMs
  const jitter = Math.random() * jitterMs * 2 - jitterMs;
  const finalDelay = Math.max(0, cappedDelay + jitter);

  return Math.floor(finalDelay);
}

/**
 * Sleep for a specified number of milliseconds; rejects with the signal's reason on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute an async function with retry logic
 *
 * @returns The result of the function or throws the last error
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const config = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
    retryableErrors: options.retryableErrors || DEFAULT_RETRY_OPTIONS.retryableErrors,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (options.signal?.aborted) {
        throw error;
      }

      if (isSafetyBlockError(error)) {
        logger.warn('Retry: Safety block error detected, not retrying', {
          attempt,
          maxAttempts: config.maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const shouldRetry = config.retryableErrors(error);

      if (!shouldRetry || attempt >= config.maxAttempts) {
        logger.error('Retry: Final attempt failed or error not retryable', {
          attempt,
          maxAttempts: config.maxAttempts,
          retryable: shouldRetry,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delayMs = calculateDelay(attempt, config.baseDelayMs, config.maxDelayMs, config.jitterMs);

      logger.warn('Retry: Attempt failed, retrying after delay', {
        attempt,
        maxAttempts: config.maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });

      await sleep(delayMs, options.signal);
    }
  }

  throw lastError;
}
