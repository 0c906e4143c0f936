/**
 * Retry strategy for download attempts
 *
 * Each failure is classified into one of three decisions:
 * - retry: same directive again after a fixed backoff
 * - alternate: next format directive at once (the source blocked the request)
 * - terminal: give up immediately
 */

import { AccessDeniedError, RetryExhaustedError } from '../errors/custom-errors.js';
import { sleep as defaultSleep } from '../utils/time-utils.js';

export type RetryDecision = 'retry' | 'alternate' | 'terminal';

export type RetryPolicy = {
  /** Total attempts, the first one included */
  maxAttempts: number;
  /** Pause before a "retry" decision, in milliseconds */
  backoffMs: number;
  classify(error: Error): RetryDecision;
};

/**
 * Passed to every attempt
 */
export type AttemptInfo = {
  /** 1-based attempt number */
  attempt: number;
  /** Index of the format directive to use; grows on "alternate" */
  variant: number;
};

export type RetryEvent = {
  attempt: number;
  error: Error;
  decision: Exclude<RetryDecision, 'terminal'>;
  delayMs: number;
};

export type RetryHooks = {
  /** Runs before the pause preceding the next attempt */
  onRetry?: (event: RetryEvent) => Promise<void> | void;
  /** Runs once before the final error is thrown */
  onGiveUp?: (error: Error, attempts: number) => Promise<void> | void;
  sleep?: (ms: number) => Promise<void>;
};

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 3000;

/**
 * Classification used for engine downloads
 *
 * Blocked requests switch format, unavailable content is final and
 * everything else (timeouts, empty payloads, unknown errors) is retried.
 */
export function classifyDownloadFailure(error: Error): RetryDecision {
  if (error instanceof AccessDeniedError) {
    return error.reason === 'blocked' ? 'alternate' : 'terminal';
  }
  return 'retry';
}

export function createDownloadRetryPolicy(
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
  backoffMs = DEFAULT_BACKOFF_MS,
): RetryPolicy {
  return { maxAttempts, backoffMs, classify: classifyDownloadFailure };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute a function with retry logic
 *
 * @returns Result of the first successful attempt
 * @throws The original error for terminal failures and for exhausted "alternate" chains,
 *   RetryExhaustedError when "retry" failures used up every attempt
 *
 * @example
 * ```ts
 * await executeWithRetry(
 *   ({ variant }) => engine.fetch(url, pickDirective(directives, variant), template),
 *   createDownloadRetryPolicy(),
 *   { onRetry: ({ attempt, error }) => logger.warning(`Retry ${attempt}: ${error.message}`) },
 * );
 * ```
 */
export async function executeWithRetry<T>(
  fn: (info: AttemptInfo) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let variant = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      // biome-ignore lint/performance/noAwaitInLoops: Sequential retry is intentional
      return await fn({ attempt, variant });
    } catch (caught) {
      const error = toError(caught);
      const decision = policy.classify(error);

      if (decision === 'terminal' || attempt >= maxAttempts) {
        await hooks.onGiveUp?.(error, attempt);

        if (decision === 'retry') {
          throw new RetryExhaustedError(`All ${attempt} attempts failed: ${error.message}`, attempt, error);
        }
        throw error;
      }

      const delayMs = decision === 'retry' ? policy.backoffMs : 0;
      await hooks.onRetry?.({ attempt, error, decision, delayMs });

      if (decision === 'alternate') {
        variant++;
      }
      await sleep(delayMs);
    }
  }
}
