import { expect, it } from 'vitest';
import { RemediationEntryNotFoundError } from '../../core/errors.js';
import type { LocalStoreOptions } from '../memory_store.js';
import type { RemediationStore } from '../types.js';

export type StoreFactory = (options: LocalStoreOptions) => RemediationStore;

/** Deterministic clock and ids for store tests */
export function fixedClock(): Required<Pick<LocalStoreOptions, 'now' | 'generateId'>> {
  let time = Date.UTC(2024, 0, 1);
  let counter = 0;
  return {
    now: () => {
      time += 1000;
      return new Date(time);
    },
    generateId: () => {
      counter += 1;
      return `entry-${counter}`;
    },
  };
}

/**
 * Behavior shared by every local remediation store.
 */
export function runStoreContract(createStore: StoreFactory): void {
  const build = (options: LocalStoreOptions = {}): RemediationStore => createStore({ ...fixedClock(), ...options });

  it('finds nothing in an empty store', async () => {
    const store = build();
    await expect(store.lookup('What is your return policy?')).resolves.toBeNull();
    await expect(store.list()).resolves.toEqual([]);
  });

  it('adds an answered entry and finds it by paraphrase', async () => {
    const store = build();
    const added = await store.addRemediation('What is your return policy?', 'Return it within 30 days for a full refund.');

    expect(added).toMatchObject({
      id: 'entry-1',
      status: 'answered',
      answer: 'Return it within 30 days for a full refund.',
      normalizedQuestion: 'what is your return policy',
      seenCount: 0,
      version: 1,
    });

    const exact = await store.lookup('what is your return policy');
    expect(exact).toEqual({
      entryId: 'entry-1',
      question: 'What is your return policy?',
      answer: 'Return it within 30 days for a full refund.',
      similarity: 1,
    });

    const paraphrase = await store.lookup("What's your return policy?");
    expect(paraphrase?.entryId).toBe('entry-1');
    expect(paraphrase?.similarity).toBeCloseTo(0.936, 3);
  });

  it('applies the similarity threshold and honours a per-call override', async () => {
    const store = build();
    await store.addRemediation('What is your return policy?', 'Return it within 30 days.');

    // Dice similarity of these two questions is about 0.816
    await expect(store.lookup('What is your refund policy?')).resolves.toBeNull();
    const relaxed = await store.lookup('What is your refund policy?', { similarityThreshold: 0.8 });
    expect(relaxed?.entryId).toBe('entry-1');
  });

  it('logs an escalated question once and counts repeats', async () => {
    const store = build();

    const first = await store.escalate('Can I return items after 30 days?', { channel: 'chat' });
    const second = await store.escalate('Can I return an item after 30 days?', { channel: 'email' });

    expect(first).toEqual({ entryId: 'entry-1', created: true });
    expect(second).toEqual({ entryId: 'entry-1', created: false });

    const entries = await store.list();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      id: 'entry-1',
      question: 'Can I return items after 30 days?',
      status: 'unanswered',
      answer: null,
      metadata: { channel: 'chat' },
      seenCount: 2,
      version: 0,
    });
    expect(entries[0].updatedAt.getTime()).toBeGreaterThan(entries[0].createdAt.getTime());
  });

  it('matches non-Latin questions only against the same question', async () => {
    const store = build();
    await store.addRemediation('退货政策是什么？', 'Return within 30 days.');

    await expect(store.lookup('这个水瓶有多大？')).resolves.toBeNull();
    await expect(store.lookup('退货政策是什么')).resolves.toEqual({
      entryId: 'entry-1',
      question: '退货政策是什么？',
      answer: 'Return within 30 days.',
      similarity: 1,
    });

    await expect(store.escalate('这个水瓶有多大？', {})).resolves.toEqual({ entryId: 'entry-2', created: true });
    await expect(store.escalate('这个水瓶有多大？', {})).resolves.toEqual({ entryId: 'entry-2', created: false });
    await expect(store.escalate('Ποιο είναι το μέγεθος;', {})).resolves.toEqual({ entryId: 'entry-3', created: true });
    await expect(store.list({ status: 'unanswered' })).resolves.toHaveLength(2);
  });

  it('never matches a query that is only punctuation', async () => {
    const store = build();
    await store.addRemediation('退货政策是什么？', 'Return within 30 days.');
    await expect(store.lookup('？？？')).resolves.toBeNull();
  });

  it('does not serve unanswered entries from lookup', async () => {
    const store = build();
    await store.escalate('How do I reset my password?', {});
    await expect(store.lookup('How do I reset my password?')).resolves.toBeNull();
  });

  it('answers an entry and replaces the answer on a second answer', async () => {
    const store = build();
    const { entryId } = await store.escalate('How do I reset my password?', {});

    const answered = await store.answer(entryId, 'Use the "Forgot password" link.');
    expect(answered).toMatchObject({ status: 'answered', answer: 'Use the "Forgot password" link.', version: 1 });

    const replaced = await store.answer(entryId, 'Open Settings > Security > Reset password.');
    expect(replaced.version).toBe(2);

    const match = await store.lookup('How do I reset my password');
    expect(match?.answer).toBe('Open Settings > Security > Reset password.');
  });

  it('starts a new unanswered entry once the earlier one is answered', async () => {
    const store = build();
    const { entryId } = await store.escalate('How do I reset my password?', {});
    await store.answer(entryId, 'Use the reset link.');

    const again = await store.escalate('How do I reset my password?', {});
    expect(again).toEqual({ entryId: 'entry-2', created: true });
  });

  it('records hits without changing the answer', async () => {
    const store = build();
    const added = await store.addRemediation('What is your return policy?', 'Within 30 days.');

    await store.recordHit(added.id);
    await store.recordHit(added.id);

    const entry = await store.get(added.id);
    expect(entry).toMatchObject({ seenCount: 2, version: 1, answer: 'Within 30 days.' });
  });

  it('raises RemediationEntryNotFoundError for unknown ids', async () => {
    const store = build();
    await expect(store.answer('missing', 'x')).rejects.toBeInstanceOf(RemediationEntryNotFoundError);
    await expect(store.recordHit('missing')).rejects.toBeInstanceOf(RemediationEntryNotFoundError);
    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('lists entries in creation order with status and limit filters', async () => {
    const store = build();
    await store.addRemediation('What is your return policy?', 'Within 30 days.');
    await store.escalate('How do I reset my password?', {});
    await store.escalate('Do you ship to Canada?', {});

    const all = await store.list();
    expect(all.map((entry) => entry.id)).toEqual(['entry-1', 'entry-2', 'entry-3']);

    const unanswered = await store.list({ status: 'unanswered' });
    expect(unanswered.map((entry) => entry.id)).toEqual(['entry-2', 'entry-3']);

    const limited = await store.list({ limit: 1 });
    expect(limited.map((entry) => entry.id)).toEqual(['entry-1']);
  });

  it('returns copies that do not alias stored state', async () => {
    const store = build();
    const added = await store.addRemediation('What is your return policy?', 'Within 30 days.');
    added.metadata.mutated = true;
    added.seenCount = 99;

    const stored = await store.get(added.id);
    expect(stored?.metadata).toEqual({});
    expect(stored?.seenCount).toBe(0);
  });
}
