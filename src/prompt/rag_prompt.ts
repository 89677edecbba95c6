/**
 * @fileoverview RAG prompt assembly
 *
 * Builds the message list a generator sees. The gate needs the same list to
 * score the response against exactly what the generator was given.
 */

import { DEFAULT_FALLBACK_ANSWER } from '../oracle/heuristic_oracle.js';
import type { ChatMessage, GateContext } from '../types.js';
import { joinContext } from '../oracle/adapter.js';

export function formPrompt(question: string, context: GateContext): string {
  return `Context:\n${joinContext(context)}\n\nUser Question:\n${question}`;
}

export function buildSystemPrompt(fallbackAnswer: string = DEFAULT_FALLBACK_ANSWER): string {
  return [
    "Answer the user's Question based on the following possibly relevant Context. Follow these rules:",
    '1. Never use phrases like "according to the context," "as the context states," etc. Treat the Context as your own knowledge, not something you are referencing.',
    '2. Give a clear, short, and accurate answer. Explain complex terms if needed.',
    '3. If the answer to the question requires today\'s date, use the following tool: get_todays_date.',
    `4. If the Context doesn't adequately address the Question, say: "${fallbackAnswer}" only, nothing else.`,
    '',
    'Remember, your purpose is to provide information based on the Context, not to offer original advice.',
  ].join('\n');
}

/**
 * System prompt, prior turns, then the user turn carrying context and question.
 */
export function buildMessages(
  systemPrompt: string,
  question: string,
  context: GateContext,
  history: readonly ChatMessage[] = []
): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    ...history,
    { role: 'user', content: formPrompt(question, context) },
  ];
}
