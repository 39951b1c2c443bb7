import type { Message } from '../../types/message.js';
import type { ToolArguments, ToolDefinition } from '../../types/tool.js';
import type { TokenUsage } from '../../types/agent.js';

/**
 * Supported model provider types
 */
export type LLMProviderType = 'openai' | 'anthropic' | 'grok';

/**
 * The model is done and answered in text
 */
export interface FinalAnswer {
  type: 'final_answer';
  text: string;
  usage?: TokenUsage;
}

/**
 * The model wants a tool executed before it continues
 */
export interface ToolCallRequest {
  type: 'tool_call';
  id: string;
  toolName: string;
  arguments: ToolArguments;
  /** Text the model sent along with the call */
  text?: string;
  usage?: TokenUsage;
}

export type ModelResponse = FinalAnswer | ToolCallRequest;

/**
 * Per-invocation settings
 */
export interface InvokeOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

/**
 * Model invocation client - anything the agent loop can send a conversation to.
 *
 * Implementations fail with `TransportError` when the endpoint cannot be
 * reached (network, auth, timeout) and `ProviderError` when it answers with
 * an error.
 */
export interface ModelClient {
  /**
   * Send the conversation and the advertised tools, get one response back
   */
  invoke(
    conversation: readonly Message[],
    tools: readonly ToolDefinition[],
    options: InvokeOptions
  ): Promise<ModelResponse>;

  /**
   * Provider name for logging
   */
  readonly name: string;
}

/**
 * Configuration shared by the HTTP model clients
 */
export interface ModelClientConfig {
  apiKey: string;
  baseUrl?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Fetch implementation, defaults to the global one */
  fetch?: typeof fetch;
}

/**
 * Extended config for factory - includes provider type, key may come from config
 */
export interface ModelClientFactoryConfig extends Omit<ModelClientConfig, 'apiKey'> {
  provider: LLMProviderType;
  apiKey?: string;
}
