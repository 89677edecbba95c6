export { AnswerQualityGate, type AnswerQualityGateOptions } from './quality_gate.js';
export {
  composeResponse,
  validateGeneration,
  DEFAULT_GUARDRAIL_MESSAGE,
  type GenerationInput,
  type GenerationResult,
  type ResponseGenerator,
} from './compose.js';
