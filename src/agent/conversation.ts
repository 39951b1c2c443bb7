import type { Message } from '../types/message.js';
import type { ToolCall } from '../types/tool.js';

export function systemMessage(content: string): Message {
  return { role: 'system', content };
}

export function userMessage(content: string): Message {
  return { role: 'user', content };
}

export function assistantMessage(content: string): Message {
  return { role: 'assistant', content };
}

/**
 * Assistant turn that asks for a tool, with any text the model sent alongside
 */
export function toolCallMessage(toolCall: ToolCall, content = ''): Message {
  return { role: 'assistant', content, toolCall };
}

/**
 * Tool output answering the call with the given id
 */
export function toolResultMessage(toolCall: ToolCall, content: string): Message {
  return { role: 'tool', content, toolCallId: toolCall.id, name: toolCall.name };
}
