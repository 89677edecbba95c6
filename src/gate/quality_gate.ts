/**
 * @fileoverview Answer quality gate orchestration
 *
 * `detect` scores a response and judges it. `validate` does the same and, when
 * the verdict escalates, consults the remediation store: a stored expert answer
 * is returned, otherwise the question is logged for review.
 *
 * Neither entry point throws for oracle or store failures. Oracle failures
 * become a degraded verdict under the configured failure policy; store
 * failures become "no expert answer".
 */

import {
  ConfigurationError,
  OracleMalformedResponseError,
  OracleTimeoutError,
  getErrorMessage,
  isOracleError,
} from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import type { OracleAdapter } from '../oracle/adapter.js';
import { joinContext } from '../oracle/adapter.js';
import type { RemediationClient } from '../remediation/client.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type {
  DegradedReason,
  DetectInput,
  FailurePolicy,
  MetricScores,
  ThresholdTable,
  ValidateInput,
  ValidateResult,
  Verdict,
} from '../types.js';
import { computeVerdict, degradedVerdict } from '../verdict/engine.js';

export interface AnswerQualityGateOptions {
  adapter: OracleAdapter;
  thresholds: ThresholdTable;
  /** Applied to oracle failures and empty score sets */
  failurePolicy: FailurePolicy;
  /** Required for `validate`; `detect` never touches it */
  remediation?: RemediationClient;
}

function degradedReasonFor(error: unknown): DegradedReason {
  if (error instanceof OracleTimeoutError) return 'oracle_timeout';
  if (error instanceof OracleMalformedResponseError) return 'oracle_malformed_response';
  return 'oracle_unavailable';
}

function escalationMetadata(input: ValidateInput, verdict: Verdict): Record<string, unknown> {
  const scores: Record<string, number> = {};
  const explanations: Record<string, string> = {};
  for (const [name, value] of Object.entries(verdict.scores)) {
    scores[name] = value.score;
    if (value.explanation) explanations[name] = value.explanation;
  }
  const metadata: Record<string, unknown> = {
    context: joinContext(input.context),
    response: input.response,
    scores,
    explanations,
    failingMetrics: [...verdict.failingMetrics],
    tags: { ...(input.metadata ?? {}) },
  };
  if (verdict.degraded) metadata.degraded = { ...verdict.degraded };
  return metadata;
}

export class AnswerQualityGate {
  private readonly adapter: OracleAdapter;
  private readonly thresholds: ThresholdTable;
  private readonly failurePolicy: FailurePolicy;
  private readonly remediation?: RemediationClient;

  constructor(options: AnswerQualityGateOptions) {
    this.adapter = options.adapter;
    this.thresholds = options.thresholds;
    this.failurePolicy = options.failurePolicy;
    this.remediation = options.remediation;
  }

  get hasRemediation(): boolean {
    return this.remediation !== undefined;
  }

  /**
   * Score and judge a response. Makes no remediation store calls.
   */
  async detect(input: DetectInput): Promise<Verdict> {
    const scored = await safeAsync(() => this.adapter.evaluate(input, input.signal));
    if (!scored.ok) {
      return this.degrade(scored.error);
    }
    return this.judge(scored.value);
  }

  /**
   * Score, judge and, when escalating, remediate a response.
   *
   * @throws ConfigurationError when the gate has no remediation store
   */
  async validate(input: ValidateInput): Promise<ValidateResult> {
    const remediation = this.remediation;
    if (!remediation) {
      throw new ConfigurationError('validate() requires a remediation store; use detect() without one');
    }

    const verdict = await this.detect(input);
    if (!verdict.shouldEscalate) {
      return { verdict, expertAnswer: null, escalated: false };
    }

    const lookup = await safeAsync(() => remediation.lookup(input.query, input.signal));
    if (!lookup.ok) {
      logWarning('Remediation lookup failed; continuing without an expert answer', {
        error: lookup.error.message,
      });
      return { verdict, expertAnswer: null, escalated: false, storeError: lookup.error.message };
    }

    const match = lookup.value;
    if (match) {
      const hit = await safeAsync(() => remediation.recordHit(match.entryId, input.signal));
      if (!hit.ok) {
        logWarning('Could not record remediation hit', { entryId: match.entryId, error: hit.error.message });
      }
      logInfo('Escalated query answered from remediation store', {
        entryId: match.entryId,
        similarity: match.similarity,
        failingMetrics: verdict.failingMetrics,
      });
      return { verdict, expertAnswer: match.answer, escalated: false };
    }

    const escalation = await safeAsync(() =>
      remediation.escalate(input.query, escalationMetadata(input, verdict), input.signal)
    );
    if (!escalation.ok) {
      logWarning('Remediation escalate failed; query was not logged', { error: escalation.error.message });
      return { verdict, expertAnswer: null, escalated: false, storeError: escalation.error.message };
    }

    logInfo('Query escalated for expert review', {
      entryId: escalation.value.entryId,
      created: escalation.value.created,
      failingMetrics: verdict.failingMetrics,
    });
    return { verdict, expertAnswer: null, escalated: true };
  }

  private judge(scores: MetricScores): Verdict {
    return computeVerdict(scores, this.thresholds, { emptyScoresPolicy: this.failurePolicy });
  }

  private degrade(error: Error): Verdict {
    if (!isOracleError(error)) {
      logWarning('Unexpected error while scoring response', { error: getErrorMessage(error) });
    }
    const reason = degradedReasonFor(error);
    logWarning('Oracle evaluation failed; applying failure policy', {
      reason,
      policy: this.failurePolicy,
      error: error.message,
    });
    return degradedVerdict(this.failurePolicy, reason, error.message);
  }
}
