import type { ApiObject, Pagination } from '../types/api.js';
import type { Client } from './client.js';

/**
 * API for managing workflows
 */
export class WorkflowsAPI {
  constructor(private readonly client: Client) {}

  list({ limit = 20, offset = 0 }: Pagination = {}): Promise<ApiObject> {
    return this.client.request('GET', '/workflows', { params: { limit, offset } });
  }

  get(workflowId: string): Promise<ApiObject> {
    return this.client.request('GET', `/workflows/${encodeURIComponent(workflowId)}`);
  }

  /**
   * Trigger a workflow run with the given inputs
   */
  trigger(workflowId: string, inputs: ApiObject = {}): Promise<ApiObject> {
    return this.client.request('POST', `/workflows/${encodeURIComponent(workflowId)}/trigger`, {
      json: { inputs },
    });
  }
}
