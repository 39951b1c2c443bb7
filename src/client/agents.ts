import { getConfig } from '../config.js';
import { toApiToolDefinition } from '../tools/tool.js';
import type { ApiToolDefinition } from '../types/tool.js';
import type { ApiObject, CreateAgentParams, Pagination, RemoteToolInput } from '../types/api.js';
import type { Client } from './client.js';

function toWireTool(input: RemoteToolInput): ApiToolDefinition {
  return 'function' in input ? input : toApiToolDefinition(input);
}

/**
 * API for managing remote agents
 */
export class AgentsAPI {
  constructor(private readonly client: Client) {}

  /**
   * List all agents
   */
  list({ limit = 20, offset = 0 }: Pagination = {}): Promise<ApiObject> {
    return this.client.request('GET', '/agents', { params: { limit, offset } });
  }

  /**
   * Get an agent by ID
   */
  get(agentId: string): Promise<ApiObject> {
    return this.client.request('GET', `/agents/${encodeURIComponent(agentId)}`);
  }

  /**
   * Create a new agent. Built tools are sent as their definitions.
   */
  create(params: CreateAgentParams): Promise<ApiObject> {
    const { name, model, systemPrompt, tools, ...extra } = params;
    return this.client.request('POST', '/agents', {
      json: {
        name,
        model: model ?? getConfig().agent.defaultModel,
        system_prompt: systemPrompt ?? null,
        tools: (tools ?? []).map(toWireTool),
        ...extra,
      },
    });
  }

  update(agentId: string, changes: ApiObject): Promise<ApiObject> {
    return this.client.request('PATCH', `/agents/${encodeURIComponent(agentId)}`, { json: changes });
  }

  async delete(agentId: string): Promise<void> {
    await this.client.request('DELETE', `/agents/${encodeURIComponent(agentId)}`);
  }

  /**
   * Run a remote agent with a message. Execution happens on the platform.
   */
  run(agentId: string, message: string, context?: ApiObject): Promise<ApiObject> {
    const data: ApiObject = { message };
    if (context && Object.keys(context).length > 0) {
      data.context = context;
    }
    return this.client.request('POST', `/agents/${encodeURIComponent(agentId)}/run`, { json: data });
  }
}
