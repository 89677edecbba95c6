/**
 * Verdict Engine
 *
 * Deterministic, stateless policy over oracle scores.
 *
 * - Only metrics present in both the scores and the threshold table count;
 *   there is no default threshold for an unconfigured metric.
 * - Guardrail and escalation are separate OR-reductions over metrics
 *   carrying the matching role, each judged against that role's threshold.
 * - An empty score set never silently passes: the caller names the policy.
 * - No side effects.
 */
import type {
  DegradedReason,
  FailurePolicy,
  MetricRole,
  MetricScores,
  MetricThreshold,
  ThresholdTable,
  Verdict,
} from '../types.js';

export interface ComputeVerdictOptions {
  /** Applied when `scores` holds no metrics at all */
  emptyScoresPolicy: FailurePolicy;
}

// ============================================================================
// CORE VERDICT (Pure Function)
// ============================================================================

/**
 * Threshold a metric uses for `role`: its role override, else the shared one.
 */
export function thresholdFor(rule: MetricThreshold, role: MetricRole): number {
  return rule.roleThresholds?.[role] ?? rule.threshold;
}

export function isTriggered(score: number, rule: MetricThreshold, role?: MetricRole): boolean {
  const threshold = role ? thresholdFor(rule, role) : rule.threshold;
  if (rule.direction === 'below') return score < threshold;
  return score > threshold;
}

/**
 * Apply the threshold table to a set of scores.
 *
 * Metrics in `scores` but not in `table` are ignored. When `scores` is empty
 * the verdict is produced by `options.emptyScoresPolicy`.
 */
export function computeVerdict(
  scores: MetricScores,
  table: ThresholdTable,
  options: ComputeVerdictOptions
): Verdict {
  const names = Object.keys(scores).sort();
  if (names.length === 0) {
    return degradedVerdict(options.emptyScoresPolicy, 'no_scores');
  }

  const guardrailMetrics: string[] = [];
  const escalationMetrics: string[] = [];

  for (const name of names) {
    const rule = Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
    if (!rule) continue;
    const score = scores[name].score;
    if (rule.roles.includes('guardrail') && isTriggered(score, rule, 'guardrail')) guardrailMetrics.push(name);
    if (rule.roles.includes('escalation') && isTriggered(score, rule, 'escalation')) escalationMetrics.push(name);
  }

  const failingMetrics = Array.from(new Set([...guardrailMetrics, ...escalationMetrics])).sort();

  return freezeVerdict({
    scores: copyScores(scores),
    shouldGuardrail: guardrailMetrics.length > 0,
    shouldEscalate: escalationMetrics.length > 0,
    failingMetrics,
    guardrailMetrics,
    escalationMetrics,
  });
}

/**
 * Verdict used when no scores could be obtained.
 *
 * fail_open: nothing is blocked or escalated.
 * fail_closed: the response is guardrailed and escalated.
 */
export function degradedVerdict(
  policy: FailurePolicy,
  reason: DegradedReason,
  error?: string
): Verdict {
  const failClosed = policy === 'fail_closed';
  return freezeVerdict({
    scores: {},
    shouldGuardrail: failClosed,
    shouldEscalate: failClosed,
    failingMetrics: [],
    guardrailMetrics: [],
    escalationMetrics: [],
    degraded: error === undefined ? { reason, policy } : { reason, policy, error },
  });
}

// ============================================================================
// HELPERS
// ============================================================================

function copyScores(scores: MetricScores): MetricScores {
  const copy: MetricScores = {};
  for (const [name, value] of Object.entries(scores)) {
    copy[name] = Object.freeze({ ...value });
  }
  return copy;
}

function freezeVerdict(verdict: Verdict): Verdict {
  Object.freeze(verdict.scores);
  Object.freeze(verdict.failingMetrics);
  Object.freeze(verdict.guardrailMetrics);
  Object.freeze(verdict.escalationMetrics);
  if (verdict.degraded) Object.freeze(verdict.degraded);
  return Object.freeze(verdict);
}
