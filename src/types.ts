/**
 * @fileoverview Shared types for the answer quality gate
 *
 * The gate sits between a question-answering pipeline and the end user:
 * pipeline output is scored by an evaluation oracle, the scores are judged
 * against a threshold table, and escalated questions are looked up in (or
 * logged to) a remediation store of expert answers.
 */

// ============================================================================
// CONVERSATION
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

/** A function call requested by the model in an assistant turn. */
export interface ToolCall {
  id: string;
  name: string;
  /** JSON argument string as the model produced it */
  arguments: string;
}

/** One role-tagged message of the prompt the generator saw. */
export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Set on `tool` messages answering a tool call */
  toolCallId?: string;
  /** Set on `assistant` messages that request tool calls */
  toolCalls?: readonly ToolCall[];
}

/**
 * Retrieved context. A list of passages is joined in order with a blank line
 * between passages; see `joinContext`.
 */
export type GateContext = string | string[];

// ============================================================================
// METRICS
// ============================================================================

/** Metric names commonly returned by scoring oracles. Any string is accepted. */
export type KnownMetricName =
  | 'trustworthiness'
  | 'response_helpfulness'
  | 'response_groundedness'
  | 'context_sufficiency'
  | 'query_ease';

export type MetricName = KnownMetricName | (string & {});

export interface MetricScore {
  /** Score in [0, 1] */
  score: number;
  explanation?: string;
}

export type MetricScores = Record<string, MetricScore>;

export type ThresholdDirection = 'below' | 'above';

export type MetricRole = 'guardrail' | 'escalation';

export interface MetricThreshold {
  threshold: number;
  /** `below`: fails when score < threshold. `above`: fails when score > threshold. */
  direction: ThresholdDirection;
  roles: readonly MetricRole[];
  /** Per-role threshold replacing `threshold` for that role only */
  roleThresholds?: Readonly<Partial<Record<MetricRole, number>>>;
}

export type ThresholdTable = Readonly<Record<string, MetricThreshold>>;

/**
 * What to do when no scores are available (oracle failure or empty payload).
 * `fail_open` passes the response through; `fail_closed` guardrails and
 * escalates everything.
 */
export type FailurePolicy = 'fail_open' | 'fail_closed';

// ============================================================================
// VERDICT
// ============================================================================

export type DegradedReason = 'oracle_unavailable' | 'oracle_timeout' | 'oracle_malformed_response' | 'no_scores';

export interface VerdictDegradation {
  reason: DegradedReason;
  policy: FailurePolicy;
  error?: string;
}

export interface Verdict {
  readonly scores: Readonly<MetricScores>;
  readonly shouldGuardrail: boolean;
  readonly shouldEscalate: boolean;
  /** Union of guardrail and escalation failures, sorted */
  readonly failingMetrics: readonly string[];
  readonly guardrailMetrics: readonly string[];
  readonly escalationMetrics: readonly string[];
  /** Present when the verdict came from a failure policy instead of scores */
  readonly degraded?: VerdictDegradation;
}

// ============================================================================
// GATE INPUT / OUTPUT
// ============================================================================

export interface DetectInput {
  query: string;
  context: GateContext;
  response: string;
  prompt: readonly ChatMessage[];
  signal?: AbortSignal;
}

export interface ValidateInput extends DetectInput {
  /** Arbitrary tags logged with an escalated question */
  metadata?: Record<string, unknown>;
}

export interface ValidateResult {
  verdict: Verdict;
  /** Expert answer from the remediation store, when escalation found one */
  expertAnswer: string | null;
  /** True when a new or existing unanswered entry was logged for this query */
  escalated: boolean;
  /** Set when the store could not be reached and the result degraded */
  storeError?: string;
}
