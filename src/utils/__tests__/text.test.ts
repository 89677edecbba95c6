import { describe, expect, it } from 'vitest';
import { normalizeText, questionSimilarity, tokenOverlap, tokenize } from '../text.js';

describe('normalizeText', () => {
  it('lowercases and collapses punctuation and whitespace', () => {
    expect(normalizeText('  What is   your RETURN policy?! ')).toBe('what is your return policy');
  });

  it('applies NFKC before stripping', () => {
    expect(normalizeText('ｆｕｌｌ width')).toBe('full width');
  });

  it('keeps letters and digits from every script', () => {
    expect(normalizeText('退货政策是什么？')).toBe('退货政策是什么');
    expect(normalizeText('Ποιο είναι το μέγεθος;')).toBe('ποιο είναι το μέγεθος');
    expect(normalizeText('Сколько стоит доставка?')).toBe('сколько стоит доставка');
  });

  it('returns an empty string for punctuation only', () => {
    expect(normalizeText('?!...')).toBe('');
  });
});

describe('tokenize', () => {
  it('splits normalized text on spaces', () => {
    expect(tokenize("Can't log-in")).toEqual(['can', 't', 'log', 'in']);
  });

  it('returns no tokens for empty input', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('questionSimilarity', () => {
  it('scores identical normalized questions as 1', () => {
    expect(questionSimilarity('What is your return policy?', 'what is your return policy')).toBe(1);
  });

  it('computes the Dice coefficient over bigrams', () => {
    // ni ig gh ht vs na ac ch ht: one shared bigram out of 4 + 4
    expect(questionSimilarity('night', 'nacht')).toBe(0.25);
  });

  it('compares non-Latin questions by their characters', () => {
    expect(questionSimilarity('退货政策是什么？', '退货政策是什么')).toBe(1);
    expect(questionSimilarity('退货政策是什么？', '这个水瓶有多大？')).toBe(0);
  });

  it('scores empty input as 0', () => {
    expect(questionSimilarity('', 'anything')).toBe(0);
    expect(questionSimilarity('???', 'anything')).toBe(0);
  });

  it('is symmetric', () => {
    const a = 'How do I reset my password?';
    const b = 'How can I reset the password?';
    expect(questionSimilarity(a, b)).toBe(questionSimilarity(b, a));
  });
});

describe('tokenOverlap', () => {
  it('returns the fraction of the first list found in the second', () => {
    expect(tokenOverlap(['a', 'b', 'c', 'd'], ['b', 'd', 'x'])).toBe(0.5);
  });

  it('returns 0 for an empty first list', () => {
    expect(tokenOverlap([], ['a'])).toBe(0);
  });
});
