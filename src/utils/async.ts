/**
 * @fileoverview Deadlines and retries
 *
 * Deadlines, abortable waits and explicit retry policies for the network
 * calls made by the oracle adapter and the remediation client.
 */

export interface WithTimeoutOptions {
  /** Names the operation in the TimeoutError message */
  context?: string;
  /** Aborted when the deadline passes so the underlying call can stop work */
  controller?: AbortController;
}

export class TimeoutError extends Error {
  constructor(
    readonly timeoutMs: number,
    context?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised when an AbortSignal cancels a wait or a retry loop.
 */
export class AbortedError extends Error {
  constructor(context?: string) {
    super(context ? `Aborted: ${context}` : 'Operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Race `promise` against a deadline. A missing, non-finite or non-positive
 * `timeoutMs` disables the deadline.
 *
 * @throws TimeoutError when the deadline passes first
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const scores = await withTimeout(oracle.evaluate(request, controller.signal), 5000, {
 *   context: 'oracle evaluate',
 *   controller,
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options: WithTimeoutOptions = {}
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout.
      reject(new TimeoutError(timeoutMs, options.context));
      options.controller?.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolve after `ms`, rejecting early with AbortedError if `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError('sleep'));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError('sleep'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// RETRY
// ============================================================================

/**
 * Explicit retry policy. Every retry re-incurs latency and cost, so there is
 * no implicit default at call sites: callers pass the policy they configured.
 */
export interface RetryPolicy {
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  /** Delay before the first retry; doubles per attempt */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay */
  maxDelayMs: number;
}

export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

export interface RetryOptions {
  policy: RetryPolicy;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Invoked before each backoff wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Run `fn` until it succeeds or the retry budget is spent.
 *
 * `fn` receives the zero-based attempt number. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, shouldRetry, onRetry, signal } = options;
  let attempt = 0;
  for (;;) {
    if (signal?.aborted) {
      throw new AbortedError('retry');
    }
    try {
      return await fn(attempt);
    } catch (error) {
      const canRetry = attempt < policy.maxRetries && (shouldRetry?.(error, attempt) ?? true);
      if (!canRetry) {
        throw error;
      }
      const delayMs = computeBackoffDelay(policy, attempt);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, signal);
      attempt += 1;
    }
  }
}
