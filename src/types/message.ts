import type { ToolCall } from './tool.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * One entry of a run's conversation.
 *
 * An assistant message that requests a tool carries `toolCall`; the tool
 * message answering it carries the matching `toolCallId` and tool `name`.
 */
export interface Message {
  role: MessageRole;
  content: string;
  toolCall?: ToolCall;
  toolCallId?: string;
  name?: string;
}
