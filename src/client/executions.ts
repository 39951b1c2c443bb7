import type { ApiObject, Pagination } from '../types/api.js';
import type { Client } from './client.js';

/**
 * API for inspecting executions
 */
export class ExecutionsAPI {
  constructor(private readonly client: Client) {}

  get(executionId: string): Promise<ApiObject> {
    return this.client.request('GET', `/executions/${encodeURIComponent(executionId)}`);
  }

  list({ limit = 20, offset = 0 }: Pagination = {}): Promise<ApiObject> {
    return this.client.request('GET', '/executions', { params: { limit, offset } });
  }
}
