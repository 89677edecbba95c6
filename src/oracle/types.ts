/**
 * @fileoverview Evaluation oracle contract
 *
 * An oracle is any service that scores a (query, context, prompt, response)
 * tuple on named metrics. Its scoring model is opaque; the adapter only
 * moves requests in and normalized scores out.
 */

import type { ChatMessage, MetricName } from '../types.js';

export interface OracleRequest {
  query: string;
  /** Context already joined into a single string */
  context: string;
  prompt: readonly ChatMessage[];
  response: string;
  /** Metric names to score */
  metrics: readonly MetricName[];
  /** Scoring model selector, service specific */
  model?: string;
  /** Quality preset selector, service specific (e.g. 'low', 'medium', 'high') */
  qualityPreset?: string;
}

/**
 * Raw oracle payload. Normalized by `parseOracleScores`.
 */
export type OracleResponse = unknown;

export interface EvaluationOracle {
  /** Identifier used in logs */
  readonly name: string;
  evaluate(request: OracleRequest, signal?: AbortSignal): Promise<OracleResponse>;
}

/**
 * Transport-level failure raised by oracle implementations. The adapter
 * decides whether to retry from `retryable`.
 */
export class OracleRequestError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'OracleRequestError';
  }
}
