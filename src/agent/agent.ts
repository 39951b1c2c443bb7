import { createLogger, generateRequestId, type Logger } from '../logger.js';
import { getConfig, type Config } from '../config.js';
import {
  AgentRunError,
  MaxTurnsExceededError,
  ToolExecutionError,
  TransportError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { ToolRegistry } from '../tools/registry.js';
import type { ModelClient, ModelResponse } from '../providers/llm/interface.js';
import type { AgentOptions, RunOptions, TokenUsage, ToolInvocation } from '../types/agent.js';
import type { Message } from '../types/message.js';
import type { Tool, ToolArguments, ToolCall, ToolDefinition } from '../types/tool.js';
import {
  assistantMessage,
  systemMessage,
  toolCallMessage,
  toolResultMessage,
  userMessage,
} from './conversation.js';
import { RunResult, addUsage } from './result.js';

const logger = createLogger('agent');

function assertMaxTurns(maxTurns: number): number {
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new ValidationError(`maxTurns must be a positive integer, got ${maxTurns}`);
  }
  return maxTurns;
}

/**
 * Serializable description of an agent, shaped for `client.agents.create`
 */
export interface AgentDescription {
  name: string;
  model: string;
  systemPrompt: string;
  tools: ToolDefinition[];
  maxTokens: number;
  temperature: number;
}

/**
 * A named bundle of model, system prompt and tools that runs a tool-calling
 * conversation loop against a model client.
 *
 * Tools are fixed at construction. Every `run` works on its own conversation,
 * so one Agent can serve concurrent runs.
 *
 * @example
 * const agent = new Agent({
 *   name: 'Research Assistant',
 *   modelClient: createModelClient({ provider: 'anthropic' }),
 *   tools: [searchDatabase],
 * });
 * const result = await agent.run('Find info about AI agents');
 * console.log(result.text);
 */
export class Agent {
  readonly name: string;
  readonly model: string;
  readonly systemPrompt: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly maxTurns: number;
  private readonly modelClient: ModelClient;
  private readonly registry: ToolRegistry;

  constructor(options: AgentOptions) {
    if (!options.name.trim()) {
      throw new ValidationError('Agent name must not be empty');
    }

    // configuration is read only for settings the caller left out
    const defaults = (): Config['agent'] => getConfig().agent;

    this.name = options.name;
    this.modelClient = options.modelClient;
    this.model = options.model ?? defaults().defaultModel;
    this.systemPrompt = options.systemPrompt ?? `You are ${options.name}, a helpful assistant.`;
    this.maxTokens = options.maxTokens ?? defaults().maxTokens;
    this.temperature = options.temperature ?? defaults().temperature;
    this.maxTurns = assertMaxTurns(options.maxTurns ?? defaults().maxTurns);
    this.registry = new ToolRegistry(options.tools ?? []).lock();

    logger.debug(
      { agent: this.name, model: this.model, provider: this.modelClient.name, tools: this.registry.names() },
      'Agent created'
    );
  }

  /**
   * Tools in the order they are advertised to the model
   */
  get tools(): readonly Tool[] {
    return this.registry.list();
  }

  /**
   * Run the agent against one user message.
   *
   * @throws AgentRunError when a model invocation fails (cause kept)
   * @throws UnknownToolError when the model asks for a tool this agent lacks
   * @throws MaxTurnsExceededError when no final answer arrives within `maxTurns`
   */
  async run(message: string, options: RunOptions = {}): Promise<RunResult> {
    if (!message.trim()) {
      throw new ValidationError('Message must not be empty');
    }
    const maxTurns = assertMaxTurns(options.maxTurns ?? this.maxTurns);

    const startTime = Date.now();
    const log = logger.child({ agent: this.name, runId: generateRequestId() });
    const conversation: Message[] = [systemMessage(this.systemPrompt), userMessage(message)];
    const toolInvocations: ToolInvocation[] = [];
    const definitions = this.registry.definitions();
    let usage: TokenUsage | undefined;

    log.debug({ maxTurns, toolCount: definitions.length }, 'Agent run started');

    for (let turn = 1; turn <= maxTurns; turn++) {
      const response = await this.invokeModel(conversation, definitions, turn, options, log);
      usage = addUsage(usage, response.usage);

      if (response.type === 'final_answer') {
        conversation.push(assistantMessage(response.text));
        log.info(
          { turns: turn, toolCalls: toolInvocations.length, duration: Date.now() - startTime },
          'Agent run completed'
        );
        return new RunResult({
          text: response.text,
          model: this.model,
          turns: turn,
          toolInvocations,
          messages: conversation,
          usage,
        });
      }

      if (!this.registry.has(response.toolName)) {
        log.warn({ turn, toolName: response.toolName }, 'Model requested an unknown tool');
      }
      const tool = this.registry.resolve(response.toolName);

      const toolCall: ToolCall = {
        id: response.id || `call_${turn}`,
        name: tool.name,
        arguments: response.arguments,
      };
      conversation.push(toolCallMessage(toolCall, response.text));

      const { output, isError } = await this.executeTool(tool, toolCall.arguments, log);
      conversation.push(toolResultMessage(toolCall, output));
      toolInvocations.push({ toolName: tool.name, arguments: toolCall.arguments, output, isError });
    }

    log.warn(
      { maxTurns, toolCalls: toolInvocations.length, duration: Date.now() - startTime },
      'Agent run hit the turn limit'
    );
    throw new MaxTurnsExceededError(maxTurns);
  }

  /**
   * Snapshot of this agent's settings and advertised tools
   */
  toJSON(): AgentDescription {
    return {
      name: this.name,
      model: this.model,
      systemPrompt: this.systemPrompt,
      tools: this.registry.definitions(),
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    };
  }

  /**
   * One turn against the model client. The run's signal and the per-turn
   * timeout both stop waiting even if the client ignores its signal.
   */
  private async invokeModel(
    conversation: Message[],
    definitions: ToolDefinition[],
    turn: number,
    options: RunOptions,
    log: Logger
  ): Promise<ModelResponse> {
    const controller = new AbortController();
    const { signal, timeoutMs } = options;
    let cleanup = (): void => {};

    const interrupted = new Promise<never>((_, reject) => {
      const onAbort = (): void => {
        controller.abort(signal?.reason);
        reject(new TransportError('Model invocation aborted', { cause: signal?.reason }));
      };
      const timer =
        timeoutMs !== undefined
          ? setTimeout(() => {
              controller.abort();
              reject(new TransportError(`Model invocation timed out after ${timeoutMs}ms`, { timeout: true }));
            }, timeoutMs)
          : undefined;

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
    });

    const startTime = Date.now();
    try {
      const response = await Promise.race([
        this.modelClient.invoke(conversation.slice(), definitions, {
          model: this.model,
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          signal: controller.signal,
        }),
        interrupted,
      ]);
      log.debug({ turn, responseType: response.type, duration: Date.now() - startTime }, 'Model turn finished');
      return response;
    } catch (error) {
      log.error({ turn, error: errorMessage(error), duration: Date.now() - startTime }, 'Model invocation failed');
      throw new AgentRunError(this.name, turn, error);
    } finally {
      cleanup();
    }
  }

  /**
   * Run a tool. Failures become the tool's output so the model can react to them.
   */
  private async executeTool(
    tool: Tool,
    args: ToolArguments,
    log: Logger
  ): Promise<{ output: string; isError: boolean }> {
    const startTime = Date.now();
    try {
      const output = await tool.invoke(args);
      log.debug({ toolName: tool.name, duration: Date.now() - startTime }, 'Tool executed');
      return { output, isError: false };
    } catch (error) {
      const failure =
        error instanceof ToolExecutionError
          ? error
          : new ToolExecutionError(tool.name, errorMessage(error), error);
      log.warn(
        { toolName: tool.name, error: failure.message, duration: Date.now() - startTime },
        'Tool execution failed'
      );
      return { output: failure.message, isError: true };
    }
  }
}
