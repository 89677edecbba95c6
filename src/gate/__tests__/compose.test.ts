import { describe, expect, it, vi } from 'vitest';
import { OracleAdapter } from '../../oracle/adapter.js';
import { RemediationClient } from '../../remediation/client.js';
import { InMemoryRemediationStore } from '../../remediation/memory_store.js';
import type { ChatMessage, ValidateResult, Verdict } from '../../types.js';
import { DEFAULT_THRESHOLDS, requiredMetrics } from '../../verdict/thresholds.js';
import { DEFAULT_GUARDRAIL_MESSAGE, composeResponse, validateGeneration } from '../compose.js';
import { AnswerQualityGate } from '../quality_gate.js';

function verdict(shouldGuardrail: boolean, shouldEscalate: boolean): Verdict {
  return {
    scores: {},
    shouldGuardrail,
    shouldEscalate,
    failingMetrics: [],
    guardrailMetrics: [],
    escalationMetrics: [],
  };
}

function result(v: Verdict, expertAnswer: string | null): ValidateResult {
  return { verdict: v, expertAnswer, escalated: false };
}

describe('composeResponse', () => {
  it('prefers the expert answer when escalating', () => {
    expect(composeResponse('original', result(verdict(true, true), 'expert'), 'fallback')).toBe('expert');
  });

  it('uses the guardrail message when there is no expert answer', () => {
    expect(composeResponse('original', result(verdict(true, true), null), 'fallback')).toBe('fallback');
    expect(composeResponse('original', result(verdict(true, false), null))).toBe(DEFAULT_GUARDRAIL_MESSAGE);
  });

  it('keeps the original response otherwise', () => {
    expect(composeResponse('original', result(verdict(false, true), null), 'fallback')).toBe('original');
    expect(composeResponse('original', result(verdict(false, false), null), 'fallback')).toBe('original');
  });
});

describe('validateGeneration', () => {
  function createGate(score: number): AnswerQualityGate {
    const adapter = new OracleAdapter(
      { name: 'fixed', evaluate: async () => ({ trustworthiness: score, response_helpfulness: score }) },
      {
        metrics: requiredMetrics(DEFAULT_THRESHOLDS),
        timeoutMs: 200,
        retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
      }
    );
    return new AnswerQualityGate({
      adapter,
      thresholds: DEFAULT_THRESHOLDS,
      failurePolicy: 'fail_open',
      remediation: new RemediationClient(new InMemoryRemediationStore(), {
        timeoutMs: 200,
        retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
      }),
    });
  }

  const prompt: ChatMessage[] = [{ role: 'user', content: 'Context:\nReturns within 30 days.\n\nUser Question:\nReturn window?' }];

  it('passes the prompt to the generator and keeps a good response', async () => {
    const generator = vi.fn(async (_prompt: readonly ChatMessage[]) => 'Within 30 days.');

    const output = await validateGeneration(createGate(0.9), generator, {
      query: 'Return window?',
      context: 'Returns within 30 days.',
      prompt,
    });

    expect(generator).toHaveBeenCalledWith(prompt, undefined);
    expect(output.response).toBe('Within 30 days.');
    expect(output.finalResponse).toBe('Within 30 days.');
    expect(output.result.escalated).toBe(false);
  });

  it('replaces a weak response with the guardrail message', async () => {
    const output = await validateGeneration(createGate(0.1), async () => 'Maybe 90 days?', {
      query: 'Return window?',
      context: 'Returns within 30 days.',
      prompt,
      guardrailMessage: 'Please contact support.',
    });

    expect(output.response).toBe('Maybe 90 days?');
    expect(output.finalResponse).toBe('Please contact support.');
    expect(output.result.escalated).toBe(true);
  });

  it('propagates generator errors', async () => {
    await expect(
      validateGeneration(createGate(0.9), async () => {
        throw new Error('model overloaded');
      }, { query: 'q', context: '', prompt })
    ).rejects.toThrow('model overloaded');
  });
});
