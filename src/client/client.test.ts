import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Hono } from 'hono';
import { z } from 'zod';
import { Client } from './client.js';
import { ApiError, AuthenticationError, ConfigError, GagiteckError, RateLimitError } from '../errors.js';
import { resetConfig } from '../config.js';
import { tool } from '../tools/tool.js';
import { honoFetch } from '../__fixtures__/hono-fetch.js';
import { streamingFetch } from '../__fixtures__/streaming-fetch.js';
import { USER_AGENT } from '../version.js';

interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string | undefined>;
  body: unknown;
}

const BASE_URL = 'http://gagiteck.test/v1';

describe('Client', () => {
  let requests: RecordedRequest[];
  let app: Hono;

  function makeClient(): Client {
    return new Client({ apiKey: 'ggt_test-secret', baseUrl: `${BASE_URL}/`, fetch: honoFetch(app) });
  }

  beforeEach(() => {
    requests = [];
    app = new Hono();
    app.use('*', async (c, next) => {
      const text = await c.req.text();
      requests.push({
        method: c.req.method,
        path: new URL(c.req.url).pathname,
        query: c.req.query(),
        headers: {
          authorization: c.req.header('authorization'),
          contentType: c.req.header('content-type'),
          userAgent: c.req.header('user-agent'),
          requestId: c.req.header('x-request-id'),
        },
        body: text ? JSON.parse(text) : undefined,
      });
      await next();
    });
  });

  describe('construction', () => {
    it('requires an API key', () => {
      expect(() => new Client()).toThrow(new AuthenticationError('API key is required'));
    });

    it('requires the ggt_ prefix', () => {
      expect(() => new Client({ apiKey: 'test-secret' })).toThrow(
        "Invalid API key format. Key should start with 'ggt_'"
      );
    });

    it('strips trailing slashes from the base URL', () => {
      expect(makeClient().baseUrl).toBe(BASE_URL);
    });
  });

  describe('configuration', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      resetConfig();
    });

    it('is only read for options the caller left out', () => {
      vi.stubEnv('AGENT_TEMPERATURE', 'hot');
      resetConfig();

      const client = new Client({
        apiKey: 'ggt_test-secret',
        baseUrl: BASE_URL,
        timeoutMs: 1000,
        debug: false,
        fetch: honoFetch(app),
      });

      expect(client.timeoutMs).toBe(1000);
      expect(() => new Client({ apiKey: 'ggt_test-secret' })).toThrow(ConfigError);
    });
  });

  describe('request', () => {
    it('sends auth and identification headers', async () => {
      app.get('/v1/agents', (c) => c.json({ agents: [], total: 0 }));

      const result = await makeClient().agents.list();

      expect(result).toEqual({ agents: [], total: 0 });
      expect(requests[0].headers.authorization).toBe('Bearer ggt_test-secret');
      expect(requests[0].headers.contentType).toBe('application/json');
      expect(requests[0].headers.userAgent).toBe(USER_AGENT);
      expect(requests[0].headers.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('maps 401 to AuthenticationError', async () => {
      app.get('/v1/agents/a1', (c) => c.text('nope', 401));

      await expect(makeClient().agents.get('a1')).rejects.toThrow(
        new AuthenticationError('Invalid or expired API key')
      );
    });

    it('maps 429 to RateLimitError with Retry-After', async () => {
      app.get('/v1/agents/a1', (c) => c.text('slow down', 429, { 'Retry-After': '12' }));
      app.get('/v1/agents/a2', (c) => c.text('slow down', 429));

      const client = makeClient();
      await expect(client.agents.get('a1')).rejects.toBeInstanceOf(RateLimitError);
      await expect(client.agents.get('a1')).rejects.toMatchObject({ statusCode: 429, retryAfter: 12 });
      await expect(client.agents.get('a2')).rejects.toMatchObject({ retryAfter: 60 });
    });

    it('maps other failures to ApiError with the body as detail', async () => {
      app.get('/v1/agents/a1', (c) => c.text('agent not found', 404));

      const pending = makeClient().agents.get('a1');
      await expect(pending).rejects.toBeInstanceOf(ApiError);
      await expect(pending).rejects.toMatchObject({ statusCode: 404, detail: 'agent not found' });
      await expect(pending).rejects.toThrow('API Error 404: agent not found');
    });

    it('reports network failures as status 0', async () => {
      const client = new Client({
        apiKey: 'ggt_test-secret',
        baseUrl: BASE_URL,
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
      });

      await expect(client.agents.list()).rejects.toMatchObject({ statusCode: 0, detail: 'fetch failed' });
    });

    it('reports a connection dropped mid-body as status 0', async () => {
      const client = new Client({
        apiKey: 'ggt_test-secret',
        baseUrl: BASE_URL,
        fetch: streamingFetch({ chunk: '{"agents":', then: 'error' }),
      });

      const pending = client.agents.list();
      await expect(pending).rejects.toBeInstanceOf(ApiError);
      await expect(pending).rejects.toMatchObject({ statusCode: 0, detail: 'terminated' });
    });

    it('times out a body that stalls after the headers', async () => {
      const client = new Client({
        apiKey: 'ggt_test-secret',
        baseUrl: BASE_URL,
        timeoutMs: 50,
        fetch: streamingFetch({ chunk: '{"agents":', then: 'stall' }),
      });

      await expect(client.agents.list()).rejects.toMatchObject({
        statusCode: 0,
        detail: 'Request timed out after 50ms',
      });
    });

    it('wraps non-object bodies', async () => {
      app.get('/v1/executions', (c) => c.json([{ id: 'e1' }]));

      await expect(makeClient().executions.list()).resolves.toEqual({ data: [{ id: 'e1' }] });
    });

    it('refuses requests once closed', async () => {
      const client = makeClient();
      client.close();

      expect(client.closed).toBe(true);
      await expect(client.agents.list()).rejects.toMatchObject({
        message: 'Client is closed',
        code: 'CLIENT_CLOSED',
      });
      await expect(client.agents.list()).rejects.toBeInstanceOf(GagiteckError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('agents', () => {
    it('lists with pagination', async () => {
      app.get('/v1/agents', (c) => c.json({ agents: [] }));

      const client = makeClient();
      await client.agents.list();
      await client.agents.list({ limit: 5, offset: 10 });

      expect(requests.map((r) => r.query)).toEqual([
        { limit: '20', offset: '0' },
        { limit: '5', offset: '10' },
      ]);
    });

    it('creates an agent with serialized tools', async () => {
      app.post('/v1/agents', (c) => c.json({ id: 'agent_1' }, 201));

      const lookup = tool(({ id }) => `found ${id}`, {
        name: 'lookup',
        description: 'Look up a record',
        parameters: z.object({ id: z.string() }),
      });

      const created = await makeClient().agents.create({
        name: 'Helper',
        systemPrompt: 'Be brief.',
        tools: [lookup],
        metadata: { team: 'support' },
      });

      expect(created).toEqual({ id: 'agent_1' });
      expect(requests[0].body).toEqual({
        name: 'Helper',
        model: 'claude-3-sonnet',
        system_prompt: 'Be brief.',
        tools: [
          {
            type: 'function',
            function: { name: 'lookup', description: 'Look up a record', parameters: lookup.parameters },
          },
        ],
        metadata: { team: 'support' },
      });
    });

    it('sends a null system prompt and no tools by default', async () => {
      app.post('/v1/agents', (c) => c.json({ id: 'agent_2' }));

      await makeClient().agents.create({ name: 'Bare', model: 'gpt-4o' });

      expect(requests[0].body).toEqual({ name: 'Bare', model: 'gpt-4o', system_prompt: null, tools: [] });
    });

    it('updates and deletes by encoded id', async () => {
      app.patch('/v1/agents/:id', (c) => c.json({ id: c.req.param('id'), name: 'Renamed' }));
      app.delete('/v1/agents/:id', (c) => c.body(null, 204));

      const client = makeClient();
      await expect(client.agents.update('a/1', { name: 'Renamed' })).resolves.toEqual({
        id: 'a/1',
        name: 'Renamed',
      });
      await expect(client.agents.delete('a/1')).resolves.toBeUndefined();

      expect(requests.map((r) => [r.method, r.path])).toEqual([
        ['PATCH', '/v1/agents/a%2F1'],
        ['DELETE', '/v1/agents/a%2F1'],
      ]);
      expect(requests[0].body).toEqual({ name: 'Renamed' });
    });

    it('runs a remote agent, sending context only when given', async () => {
      app.post('/v1/agents/:id/run', (c) => c.json({ response: 'done', execution_id: 'ex_1' }));

      const client = makeClient();
      const result = await client.agents.run('agent_1', 'Hello', { user: 'u1' });
      await client.agents.run('agent_1', 'Again', {});

      expect(result).toEqual({ response: 'done', execution_id: 'ex_1' });
      expect(requests.map((r) => r.body)).toEqual([{ message: 'Hello', context: { user: 'u1' } }, { message: 'Again' }]);
    });
  });

  describe('workflows and executions', () => {
    it('triggers a workflow with inputs', async () => {
      app.post('/v1/workflows/:id/trigger', (c) => c.json({ execution_id: 'ex_2' }));

      const client = makeClient();
      await client.workflows.trigger('wf_1', { city: 'Oslo' });
      await client.workflows.trigger('wf_1');

      expect(requests.map((r) => r.body)).toEqual([{ inputs: { city: 'Oslo' } }, { inputs: {} }]);
    });

    it('reads workflows and executions', async () => {
      app.get('/v1/workflows', (c) => c.json({ workflows: [] }));
      app.get('/v1/workflows/:id', (c) => c.json({ id: c.req.param('id') }));
      app.get('/v1/executions/:id', (c) => c.json({ id: c.req.param('id'), status: 'completed' }));

      const client = makeClient();
      await expect(client.workflows.list({ limit: 1 })).resolves.toEqual({ workflows: [] });
      await expect(client.workflows.get('wf_1')).resolves.toEqual({ id: 'wf_1' });
      await expect(client.executions.get('ex_1')).resolves.toEqual({ id: 'ex_1', status: 'completed' });
      expect(requests[0].query).toEqual({ limit: '1', offset: '0' });
    });
  });
});
