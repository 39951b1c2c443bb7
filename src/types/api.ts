import type { ApiToolDefinition, Tool, ToolDefinition } from './tool.js';

/**
 * JSON object as returned by the platform API
 */
export type ApiObject = Record<string, unknown>;

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  json?: unknown;
  params?: Record<string, QueryValue>;
}

export interface ClientOptions {
  /** Gagiteck API key, starts with `ggt_`. Defaults to GAGITECK_API_KEY. */
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Log every request and response at debug level */
  debug?: boolean;
  /** Fetch implementation, defaults to the global one */
  fetch?: typeof fetch;
}

export interface Pagination {
  limit?: number;
  offset?: number;
}

/**
 * Tools accepted when creating a remote agent: built tools, plain definitions,
 * or definitions already in wire form
 */
export type RemoteToolInput = Tool | ToolDefinition | ApiToolDefinition;

export interface CreateAgentParams {
  name: string;
  model?: string;
  systemPrompt?: string;
  tools?: RemoteToolInput[];
  /** Extra fields passed through to the API */
  [field: string]: unknown;
}
