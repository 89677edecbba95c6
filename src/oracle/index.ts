export { OracleAdapter, joinContext, CONTEXT_SEPARATOR, type OracleAdapterOptions, type OracleEvaluationInput } from './adapter.js';
export { HttpEvaluationOracle, type HttpEvaluationOracleOptions, type FetchLike } from './http_oracle.js';
export {
  HeuristicEvaluationOracle,
  isFallbackResponse,
  contentTokens,
  DEFAULT_FALLBACK_ANSWER,
  type HeuristicOracleOptions,
} from './heuristic_oracle.js';
export { parseOracleScores } from './schema.js';
export { OracleRequestError, type EvaluationOracle, type OracleRequest, type OracleResponse } from './types.js';
