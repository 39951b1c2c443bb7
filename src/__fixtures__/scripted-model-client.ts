// Test fixture: model client that replays canned responses and records every call

import type { Message } from '../types/message.js';
import type { ToolArguments, ToolDefinition } from '../types/tool.js';
import type { InvokeOptions, ModelClient, ModelResponse } from '../providers/llm/interface.js';

export interface RecordedInvocation {
  conversation: Message[];
  tools: ToolDefinition[];
  options: InvokeOptions;
}

type Step = ModelResponse | Error | ((conversation: readonly Message[]) => ModelResponse | Promise<ModelResponse>);

export class ScriptedModelClient implements ModelClient {
  readonly name = 'scripted';
  readonly calls: RecordedInvocation[] = [];
  private readonly steps: Step[];

  /**
   * `repeatLast` keeps answering with the final step once the script runs out.
   */
  constructor(steps: Step[], private readonly repeatLast = false) {
    this.steps = [...steps];
  }

  async invoke(
    conversation: readonly Message[],
    tools: readonly ToolDefinition[],
    options: InvokeOptions
  ): Promise<ModelResponse> {
    this.calls.push({ conversation: [...conversation], tools: [...tools], options });

    const step = this.steps.length > 1 || !this.repeatLast ? this.steps.shift() : this.steps[0];
    if (step === undefined) {
      throw new Error('ScriptedModelClient ran out of responses');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(conversation);
    }
    return step;
  }
}

export function finalAnswer(text: string): ModelResponse {
  return { type: 'final_answer', text };
}

export function toolCall(toolName: string, args: ToolArguments = {}, id = `call_${toolName}`): ModelResponse {
  return { type: 'tool_call', id, toolName, arguments: args };
}
