import { z } from 'zod';
import { createLogger } from '../../logger.js';
import { AuthenticationError, ProviderError } from '../../errors.js';
import type { Message } from '../../types/message.js';
import type { ToolArguments, ToolDefinition } from '../../types/tool.js';
import type { TokenUsage } from '../../types/agent.js';
import type { InvokeOptions, ModelClient, ModelClientConfig, ModelResponse } from './interface.js';
import { postJson } from './http.js';

const logger = createLogger('openai-model-client');

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const GROK_BASE_URL = 'https://api.x.ai/v1';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.literal('function').optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string(),
                }),
              })
            )
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: 'function';
        function: { name: string; arguments: string };
      }>;
    }
  | { role: 'tool'; tool_call_id: string; content: string };

/**
 * Convert our tool definition to OpenAI function format
 */
function toolToOpenAIFunction(tool: ToolDefinition): {
  type: 'function';
  function: { name: string; description: string; parameters: Record<string, unknown> };
} {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

/**
 * Convert a conversation message to OpenAI chat format
 */
function messageToOpenAI(message: Message): OpenAIMessage {
  switch (message.role) {
    case 'system':
    case 'user':
      return { role: message.role, content: message.content };

    case 'assistant':
      if (message.toolCall) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: [
            {
              id: message.toolCall.id,
              type: 'function',
              function: {
                name: message.toolCall.name,
                arguments: JSON.stringify(message.toolCall.arguments),
              },
            },
          ],
        };
      }
      return { role: 'assistant', content: message.content };

    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId ?? '',
        content: message.content,
      };
  }
}

/**
 * Tool arguments arrive as a JSON string. Anything that is not a JSON object
 * becomes `{}` and is left for argument validation to reject.
 */
function parseArguments(raw: string, toolName: string): ToolArguments {
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // fall through
  }
  logger.warn({ toolName }, 'Tool call arguments were not a JSON object');
  return {};
}

/**
 * OpenAI chat completions client. Also serves OpenAI-compatible endpoints
 * such as Grok through `baseUrl`.
 */
export class OpenAIModelClient implements ModelClient {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ModelClientConfig, name = 'openai') {
    if (!config.apiKey) {
      throw new AuthenticationError(`${name} API key is required`);
    }

    this.name = name;
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? OPENAI_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetch ?? fetch;

    logger.debug({ provider: name, baseUrl: this.baseUrl }, 'OpenAI-compatible model client initialized');
  }

  async invoke(
    conversation: readonly Message[],
    tools: readonly ToolDefinition[],
    options: InvokeOptions
  ): Promise<ModelResponse> {
    const startTime = Date.now();
    logger.debug(
      { provider: this.name, messageCount: conversation.length, toolCount: tools.length },
      'Invoking chat completion'
    );

    const body: Record<string, unknown> = {
      model: options.model,
      messages: conversation.map(messageToOpenAI),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    };

    if (tools.length > 0) {
      body.tools = tools.map(toolToOpenAIFunction);
      body.tool_choice = 'auto';
      body.parallel_tool_calls = false;
    }

    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/chat/completions`,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body,
      fetch: this.fetchImpl,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
      logger,
    });

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `${this.name} returned an unexpected response shape`,
        this.name,
        undefined,
        undefined,
        parsed.error
      );
    }

    const message = parsed.data.choices[0].message;
    const usage: TokenUsage | undefined = parsed.data.usage
      ? {
          inputTokens: parsed.data.usage.prompt_tokens,
          outputTokens: parsed.data.usage.completion_tokens,
        }
      : undefined;

    const duration = Date.now() - startTime;
    const toolCalls = message.tool_calls ?? [];

    if (toolCalls.length > 0) {
      if (toolCalls.length > 1) {
        logger.warn(
          { provider: this.name, toolCallCount: toolCalls.length },
          'Model requested several tool calls, only the first is used'
        );
      }
      const call = toolCalls[0];
      logger.info({ provider: this.name, duration, toolName: call.function.name }, 'Chat completion requested a tool');
      return {
        type: 'tool_call',
        id: call.id,
        toolName: call.function.name,
        arguments: parseArguments(call.function.arguments, call.function.name),
        text: message.content || undefined,
        usage,
      };
    }

    const text = message.content ?? '';
    logger.info({ provider: this.name, duration, textLength: text.length }, 'Chat completion answered');
    return { type: 'final_answer', text, usage };
  }
}

/**
 * Factory function to create an OpenAI model client
 */
export function createOpenAIModelClient(config: ModelClientConfig): ModelClient {
  return new OpenAIModelClient(config);
}

/**
 * Grok speaks the OpenAI chat completions protocol
 */
export function createGrokModelClient(config: ModelClientConfig): ModelClient {
  return new OpenAIModelClient({ ...config, baseUrl: config.baseUrl ?? GROK_BASE_URL }, 'grok');
}
