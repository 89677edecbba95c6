/**
 * @fileoverview Deterministic lexical oracle for offline use
 *
 * Scores with token overlap instead of a model. Intended for threshold
 * tuning, local development and tests; it is not a substitute for a real
 * scoring service.
 *
 * Fallback detection: a response that mostly repeats the configured
 * "cannot answer" sentence is treated as unhelpful and untrustworthy.
 */

import { clamp01, roundTo } from '../utils/math.js';
import { tokenOverlap, tokenize } from '../utils/text.js';
import type { MetricScore, MetricScores } from '../types.js';
import type { EvaluationOracle, OracleRequest } from './types.js';

export const DEFAULT_FALLBACK_ANSWER =
  'Based on the available information, I cannot provide a complete answer to this question.';

const FALLBACK_OVERLAP_THRESHOLD = 0.7;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'is', 'are', 'was', 'were', 'be', 'i', 'my', 'me', 'you', 'your', 'it', 'its',
  'of', 'to', 'in', 'on', 'for', 'and', 'or', 'can', 'do', 'does', 'how', 'what', 'with', 'this', 'that',
]);

export interface HeuristicOracleOptions {
  fallbackAnswer?: string;
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOPWORDS.has(token));
}

/**
 * True when `response` reads as the fallback sentence: at least 70% of the
 * fallback's tokens appear in the response.
 */
export function isFallbackResponse(response: string, fallbackAnswer: string = DEFAULT_FALLBACK_ANSWER): boolean {
  const fallbackTokens = tokenize(fallbackAnswer);
  if (fallbackTokens.length === 0) return false;
  return tokenOverlap(fallbackTokens, tokenize(response)) >= FALLBACK_OVERLAP_THRESHOLD;
}

export class HeuristicEvaluationOracle implements EvaluationOracle {
  readonly name = 'heuristic';
  private readonly fallbackAnswer: string;

  constructor(options: HeuristicOracleOptions = {}) {
    this.fallbackAnswer = options.fallbackAnswer ?? DEFAULT_FALLBACK_ANSWER;
  }

  async evaluate(request: OracleRequest): Promise<MetricScores> {
    const all = this.scoreAll(request);
    const scores: MetricScores = {};
    for (const metric of request.metrics) {
      const score = all[metric];
      if (score) scores[metric] = score;
    }
    return scores;
  }

  private scoreAll(request: OracleRequest): Record<string, MetricScore | undefined> {
    const contextTokens = contentTokens(request.context);
    const queryTokens = contentTokens(request.query);
    const responseTokens = contentTokens(request.response);
    const fallback = isFallbackResponse(request.response, this.fallbackAnswer);

    const groundedness = roundTo(tokenOverlap(responseTokens, contextTokens), 3);
    const sufficiency = roundTo(tokenOverlap(queryTokens, contextTokens), 3);
    const queryEase = roundTo(clamp01(1 - Math.max(0, queryTokens.length - 12) / 40), 3);

    let helpfulness: number;
    let trustworthiness: number;
    if (fallback) {
      helpfulness = 0.05;
      trustworthiness = roundTo(0.3 * sufficiency, 3);
    } else if (responseTokens.length === 0) {
      helpfulness = 0;
      trustworthiness = 0;
    } else {
      helpfulness = roundTo(0.5 + 0.5 * groundedness, 3);
      trustworthiness = roundTo(0.6 * groundedness + 0.4 * sufficiency, 3);
    }

    return {
      trustworthiness: {
        score: trustworthiness,
        explanation: fallback
          ? 'Response is a fallback answer'
          : `${Math.round(groundedness * 100)}% of response terms appear in the context`,
      },
      response_helpfulness: { score: helpfulness },
      response_groundedness: { score: groundedness },
      context_sufficiency: { score: sufficiency },
      query_ease: { score: queryEase },
    };
  }
}
