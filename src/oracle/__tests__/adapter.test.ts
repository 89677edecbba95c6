import { describe, expect, it, vi } from 'vitest';
import {
  OracleMalformedResponseError,
  OracleTimeoutError,
  OracleUnavailableError,
} from '../../core/errors.js';
import type { ChatMessage } from '../../types.js';
import { OracleAdapter, joinContext, type OracleAdapterOptions } from '../adapter.js';
import { OracleRequestError, type EvaluationOracle, type OracleRequest } from '../types.js';

const PROMPT: ChatMessage[] = [
  { role: 'system', content: 'Answer from the context.' },
  { role: 'user', content: 'What is the return window?' },
];

const INPUT = {
  query: 'What is the return window?',
  context: ['Returns are accepted within 30 days.', 'Refunds go to the original payment method.'],
  prompt: PROMPT,
  response: 'You can return items within 30 days.',
};

const OPTIONS: OracleAdapterOptions = {
  metrics: ['response_helpfulness', 'trustworthiness'],
  timeoutMs: 20,
  retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 },
};

function fakeOracle(evaluate: (request: OracleRequest, signal?: AbortSignal) => Promise<unknown>) {
  const spy = vi.fn(evaluate);
  const oracle: EvaluationOracle = { name: 'fake', evaluate: spy };
  return { oracle, spy };
}

describe('joinContext', () => {
  it('joins passages with a blank line and keeps strings as-is', () => {
    expect(joinContext(['a', 'b'])).toBe('a\n\nb');
    expect(joinContext('single')).toBe('single');
    expect(joinContext([])).toBe('');
  });
});

describe('OracleAdapter', () => {
  it('builds the request from the gate input and its options', () => {
    const { oracle } = fakeOracle(async () => ({}));
    const adapter = new OracleAdapter(oracle, { ...OPTIONS, model: 'judge-small', qualityPreset: 'medium' });

    expect(adapter.buildRequest(INPUT)).toEqual({
      query: INPUT.query,
      context: 'Returns are accepted within 30 days.\n\nRefunds go to the original payment method.',
      prompt: PROMPT,
      response: INPUT.response,
      metrics: ['response_helpfulness', 'trustworthiness'],
      model: 'judge-small',
      qualityPreset: 'medium',
    });
    expect(adapter.oracleName).toBe('fake');
  });

  it('returns normalized scores', async () => {
    const { oracle, spy } = fakeOracle(async () => ({
      scores: {
        trustworthiness: { score: 0.91, log: { explanation: 'Consistent with context' } },
        response_helpfulness: 0.8,
      },
    }));
    const adapter = new OracleAdapter(oracle, OPTIONS);

    await expect(adapter.evaluate(INPUT)).resolves.toEqual({
      trustworthiness: { score: 0.91, explanation: 'Consistent with context' },
      response_helpfulness: { score: 0.8 },
    });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures', async () => {
    let calls = 0;
    const { oracle, spy } = fakeOracle(async () => {
      calls += 1;
      if (calls < 3) throw new Error('connection reset');
      return { trustworthiness: 0.9 };
    });
    const adapter = new OracleAdapter(oracle, OPTIONS);

    await expect(adapter.evaluate(INPUT)).resolves.toEqual({ trustworthiness: { score: 0.9 } });
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('raises OracleUnavailableError once retries are spent', async () => {
    const { oracle, spy } = fakeOracle(async () => {
      throw new Error('connection reset');
    });
    const adapter = new OracleAdapter(oracle, OPTIONS);

    const error = await adapter.evaluate(INPUT).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleUnavailableError);
    expect(error).toMatchObject({
      message: 'Evaluation oracle unavailable: connection reset',
      attempts: 3,
    });
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('does not retry a non-retryable request error', async () => {
    const { oracle, spy } = fakeOracle(async () => {
      throw new OracleRequestError('HTTP 401: unauthorized', false, 401);
    });
    const adapter = new OracleAdapter(oracle, OPTIONS);

    const error = await adapter.evaluate(INPUT).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleUnavailableError);
    expect(error).toMatchObject({ status: 401, attempts: 1 });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('does not retry a malformed payload', async () => {
    const { oracle, spy } = fakeOracle(async () => ({ scores: { trustworthiness: 1.5 } }));
    const adapter = new OracleAdapter(oracle, OPTIONS);

    await expect(adapter.evaluate(INPUT)).rejects.toBeInstanceOf(OracleMalformedResponseError);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('times out each attempt and aborts the oracle call', async () => {
    const signals: AbortSignal[] = [];
    const { oracle, spy } = fakeOracle((_request, signal) => {
      if (signal) signals.push(signal);
      return new Promise(() => {});
    });
    const adapter = new OracleAdapter(oracle, { ...OPTIONS, retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 } });

    const error = await adapter.evaluate(INPUT).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20, attempts: 2 });
    expect(spy).toHaveBeenCalledTimes(2);
    expect(signals.map((signal) => signal.aborted)).toEqual([true, true]);
  });

  it('does not call the oracle when the caller already aborted', async () => {
    const { oracle, spy } = fakeOracle(async () => ({ trustworthiness: 0.9 }));
    const adapter = new OracleAdapter(oracle, OPTIONS);
    const controller = new AbortController();
    controller.abort();

    await expect(adapter.evaluate(INPUT, controller.signal)).rejects.toBeInstanceOf(OracleUnavailableError);
    expect(spy).not.toHaveBeenCalled();
  });
});
