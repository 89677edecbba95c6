/**
 * @fileoverview Answer Quality Gate
 *
 * Scores each response of a question-answering pipeline with an evaluation
 * oracle, decides whether to guardrail and/or escalate it, and consults a
 * remediation store of expert answers for escalated questions.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createGateFromConfig, loadGateConfig, composeResponse } from 'answer-quality-gate';
 *
 * const { gate } = createGateFromConfig(loadGateConfig({ path: 'gate.config.yaml' }));
 *
 * const result = await gate.validate({ query, context, prompt, response });
 * const shown = composeResponse(response, result);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

export const GATE_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;

// ============================================================================
// TYPES
// ============================================================================

export type {
  ChatMessage,
  ToolCall,
  ChatRole,
  DegradedReason,
  DetectInput,
  FailurePolicy,
  GateContext,
  KnownMetricName,
  MetricName,
  MetricRole,
  MetricScore,
  MetricScores,
  MetricThreshold,
  ThresholdDirection,
  ThresholdTable,
  ValidateInput,
  ValidateResult,
  Verdict,
  VerdictDegradation,
} from './types.js';

// ============================================================================
// MODULES
// ============================================================================

export * from './verdict/index.js';
export * from './oracle/index.js';
export * from './remediation/index.js';
export * from './gate/index.js';
export * from './prompt/index.js';
export * from './tools/index.js';
export * from './config/index.js';

export {
  GateError,
  OracleUnavailableError,
  OracleTimeoutError,
  OracleMalformedResponseError,
  StoreUnavailableError,
  RemediationEntryNotFoundError,
  ConfigurationError,
  isOracleError,
  type OracleError,
  type StoreOperation,
} from './core/errors.js';
export { Ok, Err, safeAsync, type Result } from './core/result.js';
export { retryWithBackoff, withTimeout, TimeoutError, type RetryPolicy } from './utils/async.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
