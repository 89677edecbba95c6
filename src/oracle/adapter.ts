/**
 * @fileoverview Evaluation Oracle Adapter
 *
 * Turns a gate input into an oracle request, enforces the per-attempt
 * deadline and retry policy, and normalizes the payload into metric scores.
 * Stateless per call.
 */

import {
  OracleMalformedResponseError,
  OracleTimeoutError,
  OracleUnavailableError,
  getErrorMessage,
  toError,
  type OracleError,
} from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ChatMessage, GateContext, MetricName, MetricScores } from '../types.js';
import { AbortedError, TimeoutError, retryWithBackoff, withTimeout, type RetryPolicy } from '../utils/async.js';
import { parseOracleScores } from './schema.js';
import { OracleRequestError, type EvaluationOracle, type OracleRequest } from './types.js';

export const CONTEXT_SEPARATOR = '\n\n';

export interface OracleAdapterOptions {
  /** Metric names requested on every call */
  metrics: readonly MetricName[];
  model?: string;
  qualityPreset?: string;
  /** Deadline for a single attempt */
  timeoutMs: number;
  retry: RetryPolicy;
}

export interface OracleEvaluationInput {
  query: string;
  context: GateContext;
  prompt: readonly ChatMessage[];
  response: string;
}

/**
 * Join retrieved passages in order with a blank line between them.
 */
export function joinContext(context: GateContext): string {
  if (typeof context === 'string') return context;
  return context.join(CONTEXT_SEPARATOR);
}

export class OracleAdapter {
  constructor(
    private readonly oracle: EvaluationOracle,
    private readonly options: OracleAdapterOptions,
  ) {}

  get oracleName(): string {
    return this.oracle.name;
  }

  buildRequest(input: OracleEvaluationInput): OracleRequest {
    const request: OracleRequest = {
      query: input.query,
      context: joinContext(input.context),
      prompt: input.prompt,
      response: input.response,
      metrics: this.options.metrics,
    };
    if (this.options.model) request.model = this.options.model;
    if (this.options.qualityPreset) request.qualityPreset = this.options.qualityPreset;
    return request;
  }

  /**
   * Score one response.
   *
   * @throws OracleUnavailableError when every attempt failed
   * @throws OracleTimeoutError when the final attempt exceeded the deadline
   * @throws OracleMalformedResponseError when the payload cannot be parsed (not retried)
   */
  async evaluate(input: OracleEvaluationInput, signal?: AbortSignal): Promise<MetricScores> {
    const request = this.buildRequest(input);
    const { timeoutMs, retry } = this.options;
    let attempts = 0;

    try {
      return await retryWithBackoff(
        async () => {
          attempts += 1;
          const payload = await this.attempt(request, signal);
          return parseOracleScores(payload);
        },
        {
          policy: retry,
          signal,
          shouldRetry: (error) => isRetryable(error),
          onRetry: (error, attempt, delayMs) => {
            logWarning('Oracle call failed, retrying', {
              oracle: this.oracle.name,
              attempt: attempt + 1,
              maxRetries: retry.maxRetries,
              delayMs,
              error: getErrorMessage(error),
            });
          },
        },
      );
    } catch (error) {
      throw toOracleError(error, timeoutMs, attempts);
    }
  }

  private async attempt(request: OracleRequest, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) throw new AbortedError('oracle evaluate');
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const startedAt = Date.now();
    try {
      const payload = await withTimeout(this.oracle.evaluate(request, controller.signal), this.options.timeoutMs, {
        context: `oracle ${this.oracle.name}`,
        controller,
      });
      logDebug('Oracle call completed', { oracle: this.oracle.name, latencyMs: Date.now() - startedAt });
      return payload;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof OracleMalformedResponseError) return false;
  if (error instanceof AbortedError) return false;
  if (error instanceof OracleRequestError) return error.retryable;
  return true;
}

function toOracleError(error: unknown, timeoutMs: number, attempts: number): OracleError {
  if (error instanceof OracleMalformedResponseError) return error;
  if (error instanceof OracleTimeoutError || error instanceof OracleUnavailableError) return error;
  if (error instanceof TimeoutError) return new OracleTimeoutError(timeoutMs, attempts);
  if (error instanceof OracleRequestError) {
    return new OracleUnavailableError(error.message, attempts, error.status, error);
  }
  const cause = toError(error);
  return new OracleUnavailableError(cause.message, attempts, undefined, cause);
}
