import type { Message } from '../types/message.js';
import type { TokenUsage, ToolInvocation } from '../types/agent.js';

export interface RunResultInit {
  text: string;
  model: string;
  turns: number;
  toolInvocations: ToolInvocation[];
  messages: Message[];
  usage?: TokenUsage;
}

/**
 * Outcome of one `Agent.run`: the final answer plus the trace of tool calls
 * made on the way, in the order they ran.
 */
export class RunResult {
  readonly text: string;
  readonly model: string;
  /** Model invocations spent, including the one that produced the answer */
  readonly turns: number;
  readonly toolInvocations: readonly ToolInvocation[];
  /** Full conversation, system prompt first */
  readonly messages: readonly Message[];
  readonly usage?: TokenUsage;

  constructor(init: RunResultInit) {
    this.text = init.text;
    this.model = init.model;
    this.turns = init.turns;
    this.toolInvocations = init.toolInvocations;
    this.messages = init.messages;
    this.usage = init.usage;
  }

  toJSON(): RunResultInit {
    return {
      text: this.text,
      model: this.model,
      turns: this.turns,
      toolInvocations: [...this.toolInvocations],
      messages: [...this.messages],
      usage: this.usage,
    };
  }
}

/**
 * Add usage reported by one turn to the running total.
 * Stays undefined until some turn reports usage.
 */
export function addUsage(total: TokenUsage | undefined, turn: TokenUsage | undefined): TokenUsage | undefined {
  if (!turn) return total;
  return {
    inputTokens: (total?.inputTokens ?? 0) + turn.inputTokens,
    outputTokens: (total?.outputTokens ?? 0) + turn.outputTokens,
  };
}
