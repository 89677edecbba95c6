import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import { OracleAdapter } from '../../oracle/adapter.js';
import type { EvaluationOracle } from '../../oracle/types.js';
import { RemediationClient } from '../../remediation/client.js';
import { InMemoryRemediationStore } from '../../remediation/memory_store.js';
import { fixedClock } from '../../remediation/__tests__/store_contract.js';
import type { FailurePolicy, ValidateInput } from '../../types.js';
import { DEFAULT_THRESHOLDS, requiredMetrics } from '../../verdict/thresholds.js';
import { AnswerQualityGate } from '../quality_gate.js';
import { composeResponse } from '../compose.js';

const EXPERT_ANSWER = 'Return it within 30 days for a full refund.';

const LOW_SCORES = {
  scores: {
    trustworthiness: { score: 0.4, explanation: 'Answer is not supported by the context' },
    response_helpfulness: { score: 0.1 },
  },
};

const HIGH_SCORES = {
  scores: {
    trustworthiness: { score: 0.95 },
    response_helpfulness: { score: 0.9 },
  },
};

const INPUT: ValidateInput = {
  query: "What's your return policy?",
  context: ['Shipping takes 5 business days.', 'Orders can be tracked online.'],
  prompt: [{ role: 'user', content: "What's your return policy?" }],
  response: 'Based on the available information, I cannot provide a complete answer to this question.',
  metadata: { channel: 'web' },
};

function scriptedOracle(payload: () => Promise<unknown>): EvaluationOracle {
  return { name: 'scripted', evaluate: payload };
}

interface Harness {
  gate: AnswerQualityGate;
  store: InMemoryRemediationStore;
}

function createHarness(
  oracle: EvaluationOracle,
  options: { failurePolicy?: FailurePolicy; timeoutMs?: number; withStore?: boolean } = {}
): Harness {
  const store = new InMemoryRemediationStore(fixedClock());
  const adapter = new OracleAdapter(oracle, {
    metrics: requiredMetrics(DEFAULT_THRESHOLDS),
    timeoutMs: options.timeoutMs ?? 200,
    retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
  });
  const gate = new AnswerQualityGate({
    adapter,
    thresholds: DEFAULT_THRESHOLDS,
    failurePolicy: options.failurePolicy ?? 'fail_open',
    remediation:
      options.withStore === false
        ? undefined
        : new RemediationClient(store, { timeoutMs: 200, retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 } }),
  });
  return { gate, store };
}

function spyOnStore(store: InMemoryRemediationStore) {
  return [
    vi.spyOn(store, 'lookup'),
    vi.spyOn(store, 'escalate'),
    vi.spyOn(store, 'recordHit'),
    vi.spyOn(store, 'answer'),
    vi.spyOn(store, 'addRemediation'),
  ];
}

describe('AnswerQualityGate.validate', () => {
  it('returns the stored expert answer for an escalated paraphrase', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));
    const added = await store.addRemediation('What is your return policy?', EXPERT_ANSWER);

    const result = await gate.validate(INPUT);

    expect(result.verdict.shouldEscalate).toBe(true);
    expect(result.verdict.shouldGuardrail).toBe(true);
    expect(result.expertAnswer).toBe(EXPERT_ANSWER);
    expect(result.escalated).toBe(false);
    expect(store.size).toBe(1);
    expect((await store.get(added.id))?.seenCount).toBe(1);
    expect(composeResponse(INPUT.response, result)).toBe(EXPERT_ANSWER);
  });

  it('logs an unanswered question once and counts repeats', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));

    const first = await gate.validate(INPUT);
    const second = await gate.validate(INPUT);

    expect(first).toMatchObject({ expertAnswer: null, escalated: true });
    expect(second).toMatchObject({ expertAnswer: null, escalated: true });

    const entries = await store.list();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      question: "What's your return policy?",
      status: 'unanswered',
      answer: null,
      seenCount: 2,
    });
    expect(entries[0].metadata).toEqual({
      context: 'Shipping takes 5 business days.\n\nOrders can be tracked online.',
      response: INPUT.response,
      scores: { trustworthiness: 0.4, response_helpfulness: 0.1 },
      explanations: { trustworthiness: 'Answer is not supported by the context' },
      failingMetrics: ['response_helpfulness', 'trustworthiness'],
      tags: { channel: 'web' },
    });
  });

  it('leaves the store alone when the verdict does not escalate', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => HIGH_SCORES));
    const spies = spyOnStore(store);

    const result = await gate.validate({ ...INPUT, response: 'Items can be returned within 30 days.' });

    expect(result).toEqual({ verdict: result.verdict, expertAnswer: null, escalated: false });
    expect(result.verdict.shouldGuardrail).toBe(false);
    expect(result.verdict.shouldEscalate).toBe(false);
    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
    expect(store.size).toBe(0);
  });

  it('fails open when the oracle times out', async () => {
    const { gate, store } = createHarness(scriptedOracle(() => new Promise(() => {})), { timeoutMs: 10 });
    const spies = spyOnStore(store);

    const result = await gate.validate(INPUT);

    expect(result.verdict).toMatchObject({
      shouldGuardrail: false,
      shouldEscalate: false,
      degraded: { reason: 'oracle_timeout', policy: 'fail_open' },
    });
    expect(result.expertAnswer).toBeNull();
    expect(result.escalated).toBe(false);
    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
  });

  it('fails closed by guardrailing and escalating with the degradation recorded', async () => {
    const { gate, store } = createHarness(
      scriptedOracle(async () => {
        throw new Error('connection refused');
      }),
      { failurePolicy: 'fail_closed' }
    );

    const result = await gate.validate(INPUT);

    expect(result.verdict).toMatchObject({
      shouldGuardrail: true,
      shouldEscalate: true,
      degraded: { reason: 'oracle_unavailable', policy: 'fail_closed' },
    });
    expect(result.escalated).toBe(true);
    const [entry] = await store.list();
    expect(entry.metadata.degraded).toEqual({
      reason: 'oracle_unavailable',
      policy: 'fail_closed',
      error: 'Evaluation oracle unavailable: connection refused',
    });
  });

  it('degrades to no expert answer when the store lookup fails', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));
    vi.spyOn(store, 'lookup').mockRejectedValue(new Error('disk I/O error'));

    const result = await gate.validate(INPUT);

    expect(result).toMatchObject({
      expertAnswer: null,
      escalated: false,
      storeError: 'Remediation store lookup failed: disk I/O error',
    });
    expect(store.size).toBe(0);
  });

  it('reports an escalate failure without throwing', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));
    vi.spyOn(store, 'escalate').mockRejectedValue(new Error('read-only database'));

    const result = await gate.validate(INPUT);

    expect(result).toMatchObject({
      expertAnswer: null,
      escalated: false,
      storeError: 'Remediation store escalate failed: read-only database',
    });
  });

  it('still returns the expert answer when recording the hit fails', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));
    await store.addRemediation('What is your return policy?', EXPERT_ANSWER);
    vi.spyOn(store, 'recordHit').mockRejectedValue(new Error('busy'));

    const result = await gate.validate(INPUT);

    expect(result.expertAnswer).toBe(EXPERT_ANSWER);
  });

  it('is deterministic for a deterministic oracle', async () => {
    const first = await createHarness(scriptedOracle(async () => LOW_SCORES)).gate.validate(INPUT);
    const second = await createHarness(scriptedOracle(async () => LOW_SCORES)).gate.validate(INPUT);
    expect(second).toEqual(first);
  });

  it('requires a remediation store', async () => {
    const { gate } = createHarness(scriptedOracle(async () => LOW_SCORES), { withStore: false });
    expect(gate.hasRemediation).toBe(false);
    await expect(gate.validate(INPUT)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(gate.detect(INPUT)).resolves.toMatchObject({ shouldEscalate: true });
  });
});

describe('AnswerQualityGate.detect', () => {
  it('judges the response without touching the store', async () => {
    const { gate, store } = createHarness(scriptedOracle(async () => LOW_SCORES));
    const spies = spyOnStore(store);

    const verdict = await gate.detect(INPUT);

    expect(verdict).toMatchObject({
      shouldGuardrail: true,
      shouldEscalate: true,
      failingMetrics: ['response_helpfulness', 'trustworthiness'],
      guardrailMetrics: ['trustworthiness'],
      escalationMetrics: ['response_helpfulness', 'trustworthiness'],
    });
    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
  });

  it('maps a malformed oracle payload to a degraded verdict', async () => {
    const { gate } = createHarness(scriptedOracle(async () => ({ scores: { trustworthiness: 'high' } })));

    const verdict = await gate.detect(INPUT);

    expect(verdict.degraded?.reason).toBe('oracle_malformed_response');
    expect(verdict.shouldGuardrail).toBe(false);
  });

  it('applies the failure policy to an empty score set', async () => {
    const { gate } = createHarness(scriptedOracle(async () => ({ scores: {} })), { failurePolicy: 'fail_closed' });

    const verdict = await gate.detect(INPUT);

    expect(verdict).toMatchObject({ shouldGuardrail: true, shouldEscalate: true, degraded: { reason: 'no_scores' } });
  });
});
