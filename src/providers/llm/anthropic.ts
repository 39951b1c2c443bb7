import { z } from 'zod';
import { createLogger } from '../../logger.js';
import { AuthenticationError, ProviderError } from '../../errors.js';
import type { Message } from '../../types/message.js';
import type { ToolDefinition } from '../../types/tool.js';
import type { TokenUsage } from '../../types/agent.js';
import type { InvokeOptions, ModelClient, ModelClientConfig, ModelResponse } from './interface.js';
import { postJson } from './http.js';

const logger = createLogger('anthropic-model-client');

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
const ANTHROPIC_VERSION = '2023-06-01';

const ContentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: z.record(z.string(), z.unknown()),
  }),
]);

const MessagesResponseSchema = z.object({
  content: z.array(
    z.union([
      ContentBlockSchema,
      // thinking and other block types are ignored
      z.object({ type: z.string() }),
    ])
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

type AnthropicContent =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string };

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContent[];
}

/**
 * Convert our tool definition to Anthropic tool format
 */
function toolToAnthropicTool(tool: ToolDefinition): {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
} {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  };
}

/**
 * Convert a conversation message to Anthropic message format.
 * System messages are lifted out into the `system` field by the caller.
 */
function messageToAnthropic(message: Message): AnthropicMessage {
  if (message.role === 'tool') {
    return {
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: message.toolCallId ?? '',
          content: message.content,
        },
      ],
    };
  }

  if (message.role === 'assistant' && message.toolCall) {
    const content: AnthropicContent[] = [];
    if (message.content) {
      content.push({ type: 'text', text: message.content });
    }
    content.push({
      type: 'tool_use',
      id: message.toolCall.id,
      name: message.toolCall.name,
      input: message.toolCall.arguments,
    });
    return { role: 'assistant', content };
  }

  return {
    role: message.role === 'assistant' ? 'assistant' : 'user',
    content: message.content,
  };
}

/**
 * Anthropic (Claude) model client over the Messages API
 */
export class AnthropicModelClient implements ModelClient {
  readonly name = 'anthropic';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ModelClientConfig) {
    if (!config.apiKey) {
      throw new AuthenticationError('Anthropic API key is required');
    }

    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetch ?? fetch;

    logger.debug({ baseUrl: this.baseUrl }, 'Anthropic model client initialized');
  }

  async invoke(
    conversation: readonly Message[],
    tools: readonly ToolDefinition[],
    options: InvokeOptions
  ): Promise<ModelResponse> {
    const startTime = Date.now();
    logger.debug(
      { messageCount: conversation.length, toolCount: tools.length },
      'Invoking Anthropic messages'
    );

    const system = conversation
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const body: Record<string, unknown> = {
      model: options.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: conversation.filter((m) => m.role !== 'system').map(messageToAnthropic),
    };

    if (system) {
      body.system = system;
    }

    if (tools.length > 0) {
      body.tools = tools.map(toolToAnthropicTool);
      body.tool_choice = { type: 'auto', disable_parallel_tool_use: true };
    }

    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/messages`,
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body,
      fetch: this.fetchImpl,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
      logger,
    });

    const parsed = MessagesResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('anthropic returned an unexpected response shape', this.name, undefined, undefined, parsed.error);
    }

    const usage: TokenUsage | undefined = parsed.data.usage
      ? {
          inputTokens: parsed.data.usage.input_tokens,
          outputTokens: parsed.data.usage.output_tokens,
        }
      : undefined;

    const duration = Date.now() - startTime;
    let text = '';

    for (const block of parsed.data.content) {
      const known = ContentBlockSchema.safeParse(block);
      if (!known.success) continue;

      if (known.data.type === 'tool_use') {
        logger.info({ duration, toolName: known.data.name }, 'Anthropic requested a tool');
        return {
          type: 'tool_call',
          id: known.data.id,
          toolName: known.data.name,
          arguments: known.data.input,
          text: text || undefined,
          usage,
        };
      }

      text += known.data.text;
    }

    logger.info({ duration, textLength: text.length }, 'Anthropic answered');
    return { type: 'final_answer', text, usage };
  }
}

/**
 * Factory function to create an Anthropic model client
 */
export function createAnthropicModelClient(config: ModelClientConfig): ModelClient {
  return new AnthropicModelClient(config);
}
