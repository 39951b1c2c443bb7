import type { Tool, ToolArguments } from './tool.js';
import type { ModelClient } from '../providers/llm/interface.js';

export interface AgentOptions {
  name: string;
  modelClient: ModelClient;
  /** Model identifier passed to the model client on every turn */
  model?: string;
  systemPrompt?: string;
  tools?: Tool[];
  maxTokens?: number;
  temperature?: number;
  /** Default turn limit for `run` */
  maxTurns?: number;
}

export interface RunOptions {
  maxTurns?: number;
  /** Timeout applied to each model invocation */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ToolInvocation {
  toolName: string;
  arguments: ToolArguments;
  output: string;
  isError: boolean;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}
