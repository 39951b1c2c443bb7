// Gagiteck SDK - client library for the Gagiteck agentic AI platform

export { Client, API_KEY_PREFIX, type HttpMethod } from './client/client.js';
export { AgentsAPI } from './client/agents.js';
export { WorkflowsAPI } from './client/workflows.js';
export { ExecutionsAPI } from './client/executions.js';

export { Agent, type AgentDescription } from './agent/agent.js';
export { RunResult } from './agent/result.js';

export {
  tool,
  createTool,
  isTool,
  toToolDefinition,
  toApiToolDefinition,
  type ToolHandler,
  type ToolOptions,
  type CreateToolOptions,
} from './tools/tool.js';
export { ToolRegistry } from './tools/registry.js';
export { validateToolArguments, type ToolValidationResult } from './tools/validator.js';

export {
  createModelClient,
  getDefaultModel,
  getDefaultProviderType,
  getSupportedProviders,
  isProviderSupported,
} from './providers/llm/factory.js';
export { OpenAIModelClient } from './providers/llm/openai.js';
export { AnthropicModelClient } from './providers/llm/anthropic.js';
export type {
  LLMProviderType,
  ModelClient,
  ModelClientConfig,
  ModelClientFactoryConfig,
  ModelResponse,
  FinalAnswer,
  ToolCallRequest,
  InvokeOptions,
} from './providers/llm/interface.js';

export {
  GagiteckError,
  ConfigError,
  ValidationError,
  AuthenticationError,
  ApiError,
  RateLimitError,
  TransportError,
  ProviderError,
  DuplicateToolError,
  UnknownToolError,
  ToolExecutionError,
  MaxTurnsExceededError,
  AgentRunError,
} from './errors.js';

export { getConfig, parseConfig, resetConfig, type Config } from './config.js';
export { createLogger, type Logger } from './logger.js';
export { SDK_VERSION } from './version.js';

export type { Message, MessageRole } from './types/message.js';
export type {
  Tool,
  ToolCall,
  ToolDefinition,
  ToolArguments,
  JsonSchema,
  ApiToolDefinition,
} from './types/tool.js';
export type { AgentOptions, RunOptions, ToolInvocation, TokenUsage } from './types/agent.js';
export type {
  ApiObject,
  ClientOptions,
  CreateAgentParams,
  Pagination,
  RemoteToolInput,
} from './types/api.js';
