import { afterEach, describe, expect, it, vi } from 'vitest';
import { createGateFromConfig, type GateRuntime } from '../../config/gate_factory.js';
import { parseGateConfig } from '../../config/loader.js';
import { DEFAULT_FALLBACK_ANSWER } from '../../oracle/heuristic_oracle.js';
import { buildMessages, buildSystemPrompt } from '../../prompt/rag_prompt.js';
import { DEFAULT_GUARDRAIL_MESSAGE, validateGeneration } from '../compose.js';

const CONTEXT = [
  'The water bottle measures 10 inches height x 4 inches width.',
  'It is made of stainless steel and keeps drinks cold for 24 hours.',
];

const EXPERT_ANSWER = 'Yes, unused water bottles can be returned within 30 days for a full refund.';

function turn(query: string) {
  return { query, context: CONTEXT, prompt: buildMessages(buildSystemPrompt(), query, CONTEXT), metadata: { channel: 'chat' } };
}

describe('gate scenarios with the heuristic oracle and an in-memory store', () => {
  let runtime: GateRuntime;

  afterEach(() => {
    runtime.close();
  });

  it('escalates an unanswerable question, then serves the expert answer once one is given', async () => {
    runtime = createGateFromConfig(parseGateConfig({ store: { kind: 'memory' } }));
    const store = runtime.store;
    if (!store) throw new Error('memory store missing');
    const generator = vi.fn(async () => DEFAULT_FALLBACK_ANSWER);

    const first = await validateGeneration(runtime.gate, generator, turn('Can I return my water bottle?'));

    expect(first.result.verdict).toMatchObject({
      shouldGuardrail: true,
      shouldEscalate: true,
      failingMetrics: ['response_helpfulness', 'trustworthiness'],
      guardrailMetrics: ['trustworthiness'],
    });
    expect(first.result.verdict.scores.trustworthiness?.score).toBe(0.2);
    expect(first.result.verdict.scores.response_helpfulness?.score).toBe(0.05);
    expect(first.result).toMatchObject({ expertAnswer: null, escalated: true });
    expect(first.finalResponse).toBe(DEFAULT_GUARDRAIL_MESSAGE);

    const pending = await store.list({ status: 'unanswered' });
    expect(pending).toHaveLength(1);
    expect(pending[0]).toMatchObject({
      question: 'Can I return my water bottle?',
      seenCount: 1,
      metadata: { response: DEFAULT_FALLBACK_ANSWER, tags: { channel: 'chat' } },
    });

    await store.answer(pending[0].id, EXPERT_ANSWER);

    const second = await validateGeneration(runtime.gate, generator, turn('can I return my water bottle'));

    expect(second.result).toMatchObject({ expertAnswer: EXPERT_ANSWER, escalated: false });
    expect(second.result.verdict.shouldEscalate).toBe(true);
    expect(second.finalResponse).toBe(EXPERT_ANSWER);
    await expect(store.get(pending[0].id)).resolves.toMatchObject({ status: 'answered', seenCount: 2, version: 1 });
    await expect(store.list({ status: 'unanswered' })).resolves.toEqual([]);
  });

  it('passes a grounded answer through without touching the store', async () => {
    runtime = createGateFromConfig(parseGateConfig({ store: { kind: 'memory' } }));
    const response = 'The water bottle is 10 inches in height and 4 inches in width.';

    const outcome = await validateGeneration(runtime.gate, async () => response, turn('How big is the water bottle?'));

    expect(outcome.result.verdict).toMatchObject({
      shouldGuardrail: false,
      shouldEscalate: false,
      failingMetrics: [],
    });
    expect(outcome.result.verdict.scores.trustworthiness?.score).toBe(0.867);
    expect(outcome.result.verdict.scores.response_helpfulness?.score).toBe(1);
    expect(outcome.result).toMatchObject({ expertAnswer: null, escalated: false });
    expect(outcome.finalResponse).toBe(response);
    await expect(runtime.store?.list()).resolves.toEqual([]);
  });
});
