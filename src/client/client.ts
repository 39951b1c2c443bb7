import { z } from 'zod';
import { createLogger, generateRequestId, type Logger } from '../logger.js';
import { getConfig } from '../config.js';
import { ApiError, AuthenticationError, GagiteckError, RateLimitError, errorMessage } from '../errors.js';
import { USER_AGENT } from '../version.js';
import type { ApiObject, ClientOptions, QueryValue, RequestOptions } from '../types/api.js';
import { AgentsAPI } from './agents.js';
import { WorkflowsAPI } from './workflows.js';
import { ExecutionsAPI } from './executions.js';

const baseLogger = createLogger('client');

export const API_KEY_PREFIX = 'ggt_';
const DEFAULT_RETRY_AFTER_SECONDS = 60;

const ApiObjectSchema = z.record(z.string(), z.unknown());

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

function buildUrl(baseUrl: string, path: string, params?: Record<string, QueryValue>): string {
  const url = new URL(`${baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function parseRetryAfter(header: string | null): number {
  const seconds = Number(header);
  return header !== null && Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

/**
 * Main client for the Gagiteck API.
 *
 * @example
 * const client = new Client({ apiKey: 'ggt_your_key_here' });
 * const agents = await client.agents.list();
 */
export class Client {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly debug: boolean;

  readonly agents: AgentsAPI;
  readonly workflows: WorkflowsAPI;
  readonly executions: ExecutionsAPI;

  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private isClosed = false;

  constructor(options: ClientOptions = {}) {
    // configuration is read only for settings the caller left out
    const apiKey = options.apiKey ?? getConfig().apiKey;

    if (!apiKey) {
      throw new AuthenticationError('API key is required');
    }
    if (!apiKey.startsWith(API_KEY_PREFIX)) {
      throw new AuthenticationError(`Invalid API key format. Key should start with '${API_KEY_PREFIX}'`);
    }

    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? getConfig().baseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? getConfig().timeoutMs;
    this.debug = options.debug ?? getConfig().debug;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = this.debug ? baseLogger.child({ debug: true }, { level: 'debug' }) : baseLogger;

    this.agents = new AgentsAPI(this);
    this.workflows = new WorkflowsAPI(this);
    this.executions = new ExecutionsAPI(this);

    this.logger.debug({ baseUrl: this.baseUrl, timeoutMs: this.timeoutMs }, 'Client initialized');
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Make an HTTP request to the API and return the decoded JSON body.
   *
   * A body that is JSON but not an object is returned as `{ data: <body> }`.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiObject> {
    if (this.isClosed) {
      throw new GagiteckError('Client is closed', 'CLIENT_CLOSED');
    }

    const requestId = generateRequestId();
    const url = buildUrl(this.baseUrl, path, options.params);
    const startTime = Date.now();

    this.logger.debug({ requestId, method, path }, 'API request');

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
          'X-Request-Id': requestId,
        },
        body: options.json === undefined ? undefined : JSON.stringify(options.json),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // the timeout signal also covers reading the body
      text = await response.text();
    } catch (error) {
      const duration = Date.now() - startTime;
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const message = timedOut ? `Request timed out after ${this.timeoutMs}ms` : errorMessage(error);
      this.logger.error({ requestId, method, path, duration, error: message }, 'API request failed');
      throw new ApiError(0, message, error);
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      this.logger.warn({ requestId, method, path, status: response.status, duration }, 'API request rejected');

      if (response.status === 401) {
        throw new AuthenticationError('Invalid or expired API key');
      }
      if (response.status === 429) {
        throw new RateLimitError(text, parseRetryAfter(response.headers.get('retry-after')));
      }
      throw new ApiError(response.status, text);
    }

    this.logger.debug({ requestId, method, path, status: response.status, duration }, 'API response');

    if (!text.trim()) {
      return {};
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ApiError(response.status, 'Response body is not valid JSON', error);
    }

    const parsed = ApiObjectSchema.safeParse(body);
    return parsed.success ? parsed.data : { data: body };
  }

  /**
   * Stop accepting requests
   */
  close(): void {
    this.isClosed = true;
    this.logger.debug('Client closed');
  }
}
