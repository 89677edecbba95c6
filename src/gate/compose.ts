/**
 * @fileoverview Final response composition and the generate-then-validate
 * convenience wrapper.
 */

import type { ChatMessage, GateContext, ValidateResult } from '../types.js';
import type { AnswerQualityGate } from './quality_gate.js';

export const DEFAULT_GUARDRAIL_MESSAGE =
  "I'm not confident I can answer that correctly. Please contact support for help with this question.";

/**
 * Pick the response to show the user:
 * 1. the expert answer, when escalation found one;
 * 2. the guardrail message, when the verdict guardrails;
 * 3. the original response.
 */
export function composeResponse(
  original: string,
  result: ValidateResult,
  guardrailMessage: string = DEFAULT_GUARDRAIL_MESSAGE
): string {
  if (result.verdict.shouldEscalate && result.expertAnswer !== null) {
    return result.expertAnswer;
  }
  if (result.verdict.shouldGuardrail) {
    return guardrailMessage;
  }
  return original;
}

export type ResponseGenerator = (prompt: readonly ChatMessage[], signal?: AbortSignal) => Promise<string>;

export interface GenerationInput {
  query: string;
  context: GateContext;
  prompt: readonly ChatMessage[];
  metadata?: Record<string, unknown>;
  guardrailMessage?: string;
  signal?: AbortSignal;
}

export interface GenerationResult {
  /** Raw generator output */
  response: string;
  /** What to show the user, per `composeResponse` */
  finalResponse: string;
  result: ValidateResult;
}

/**
 * Generate a response with the caller's generator, validate it, and compose
 * the final answer. Generator errors propagate to the caller.
 */
export async function validateGeneration(
  gate: AnswerQualityGate,
  generator: ResponseGenerator,
  input: GenerationInput
): Promise<GenerationResult> {
  const response = await generator(input.prompt, input.signal);
  const result = await gate.validate({
    query: input.query,
    context: input.context,
    prompt: input.prompt,
    response,
    metadata: input.metadata,
    signal: input.signal,
  });
  return {
    response,
    finalResponse: composeResponse(response, result, input.guardrailMessage),
    result,
  };
}
