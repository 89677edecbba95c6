/**
 * @fileoverview Prompt message builders for generator turns
 *
 * Reconstruct the turns a generator produced, so a prompt handed to the gate
 * matches the conversation the generator actually had, tool calls included.
 */

import type { ChatMessage, ToolCall } from '../types.js';
import type { ToolRegistry } from '../tools/registry.js';

export function responseMessage(response: string): ChatMessage {
  return { role: 'assistant', content: response };
}

/** Assistant turn requesting one tool call; `args` is the JSON argument string. */
export function toolCallMessage(id: string, name: string, args: string): ChatMessage {
  return { role: 'assistant', content: '', toolCalls: [{ id, name, arguments: args }] };
}

export function toolResultMessage(id: string, output: string): ChatMessage {
  return { role: 'tool', content: output, toolCallId: id };
}

/**
 * Run a requested tool call through the registry and return the call turn
 * followed by its result turn.
 */
export async function runToolCall(registry: ToolRegistry, call: ToolCall): Promise<ChatMessage[]> {
  const output = await registry.dispatch(call.name, call.arguments);
  return [toolCallMessage(call.id, call.name, call.arguments), toolResultMessage(call.id, output)];
}
