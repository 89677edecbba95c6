export { formPrompt, buildSystemPrompt, buildMessages } from './rag_prompt.js';
export { responseMessage, toolCallMessage, toolResultMessage, runToolCall } from './messages.js';
