/**
 * @fileoverview Remediation Store Client
 *
 * The gate's handle on a remediation store. Adds a per-call deadline and an
 * explicit retry policy, and reports every failure as StoreUnavailableError so
 * the gate can degrade to "no expert answer" instead of failing the request.
 */

import { StoreUnavailableError, getErrorMessage, toError, type StoreOperation } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { AbortedError, retryWithBackoff, withTimeout, type RetryPolicy } from '../utils/async.js';
import type { EscalationRecord, RemediationMatch, RemediationStore } from './types.js';

export interface RemediationClientOptions {
  /** Deadline for a single store call */
  timeoutMs: number;
  retry: RetryPolicy;
  /** Forwarded to `lookup` as a similarity override */
  similarityThreshold?: number;
}

export class RemediationClient {
  constructor(
    readonly store: RemediationStore,
    private readonly options: RemediationClientOptions,
  ) {}

  /**
   * Best expert answer for `query`, or null when none is similar enough.
   *
   * @throws StoreUnavailableError
   */
  async lookup(query: string, signal?: AbortSignal): Promise<RemediationMatch | null> {
    const threshold = this.options.similarityThreshold;
    return this.call('lookup', signal, (attemptSignal) =>
      this.store.lookup(query, threshold === undefined ? {} : { similarityThreshold: threshold }, attemptSignal)
    );
  }

  /**
   * Log `query` for expert review.
   *
   * @throws StoreUnavailableError
   */
  async escalate(query: string, metadata: Record<string, unknown>, signal?: AbortSignal): Promise<EscalationRecord> {
    return this.call('escalate', signal, (attemptSignal) =>
      this.store.escalate(query, metadata, attemptSignal)
    );
  }

  /**
   * @throws StoreUnavailableError
   */
  async recordHit(entryId: string, signal?: AbortSignal): Promise<void> {
    await this.call('record_hit', signal, (attemptSignal) => this.store.recordHit(entryId, attemptSignal));
  }

  private async call<T>(
    operation: StoreOperation,
    signal: AbortSignal | undefined,
    fn: (attemptSignal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const { retry } = this.options;
    try {
      return await retryWithBackoff(
        () => this.attempt(operation, signal, fn),
        {
          policy: retry,
          signal,
          shouldRetry: (error) => !(error instanceof AbortedError),
          onRetry: (error, attempt, delayMs) => {
            logWarning('Remediation store call failed, retrying', {
              operation,
              attempt: attempt + 1,
              maxRetries: retry.maxRetries,
              delayMs,
              error: getErrorMessage(error),
            });
          },
        },
      );
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      const cause = toError(error);
      throw new StoreUnavailableError(operation, cause.message, cause);
    }
  }

  /**
   * One store call under its own deadline. The call's signal aborts when the
   * deadline passes or the caller's signal aborts.
   */
  private async attempt<T>(
    operation: StoreOperation,
    signal: AbortSignal | undefined,
    fn: (attemptSignal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) throw new AbortedError(`remediation store ${operation}`);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await withTimeout(fn(controller.signal), this.options.timeoutMs, {
        context: `remediation store ${operation}`,
        controller,
      });
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
