import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OrchestratorError } from '../src/errors.js';
import { ProxyService } from '../src/services/proxy.js';
import { parseContract } from '../src/services/contract.js';
import { Harness, createHarness } from './helpers/harness.js';
import { AGENT_DOCUMENT } from './helpers/fake-supervisor.js';
import { TestApp, TestAppOptions, createTestApp } from './helpers/test-app.js';

const RANGE = { start: 4400, end: 4499 };

describe('Proxy', () => {
  let harness: Harness;
  let testApp: TestApp;
  let port: number;

  async function start(options: TestAppOptions = {}): Promise<void> {
    harness = await createHarness({ portRange: RANGE });
    testApp = await createTestApp(harness, options);
    port = (await harness.orchestrator.setup({ correlationId: 'abc123' })).port;
  }

  function agent() {
    const found = harness.supervisor.agentFor('abc123');
    if (!found) throw new Error('no agent for abc123');
    return found;
  }

  function url(path: string): string {
    return `${testApp.http.baseUrl}/instances/abc123${path}`;
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await testApp.http.close();
    await harness.cleanup();
    vi.restoreAllMocks();
  });

  describe('forwarding', () => {
    beforeEach(async () => {
      await start();
    });

    it('forwards a declared call with its query and without caller headers', async () => {
      const response = await fetch(url('/proxy/session/ses_1?verbose=1'), {
        headers: { 'X-Forwarded-For': '203.0.113.9', 'X-Real-IP': '203.0.113.9' },
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        id: 'ses_1',
        query: { verbose: '1' },
        forwardedFor: null,
        realIp: null,
        host: `127.0.0.1:${port}`,
      });
    });

    it('streams request bodies through', async () => {
      const response = await fetch(url('/proxy/session/ses_1/message'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: 'why does this fail?' }),
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({ id: 'ses_1', received: { text: 'why does this fail?' } });
    });

    it('takes the upstream path from the path query parameter', async () => {
      const response = await fetch(url('/proxy?path=/session/ses_2&verbose=1'));

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ id: 'ses_2', query: { verbose: '1' } });
    });

    it('rejects a path the agent does not declare without contacting it', async () => {
      const response = await fetch(url('/proxy/admin/config'));

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: 'Rejected GET /admin/config: path is not part of the agent API',
        kind: 'RequestRejected',
      });
      expect(agent().requests).toEqual([]);
    });

    it('rejects an undeclared method on a declared path', async () => {
      const response = await fetch(url('/proxy/session/ses_1'), { method: 'PUT' });

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: 'Rejected PUT /session/ses_1: method PUT is not allowed (allowed: DELETE, GET)',
        kind: 'RequestRejected',
      });
      expect(agent().requests).toEqual([]);
    });

    it('rejects dot segments in the path parameter without contacting the agent', async () => {
      const post = await fetch(url('/proxy?path=/session/../message'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: 'hi' }),
      });
      const read = await fetch(url('/proxy?path=/session/..'));

      expect(post.status).toBe(403);
      expect(await post.json()).toEqual({
        error: 'Rejected POST /session/../message: path is not part of the agent API',
        kind: 'RequestRejected',
      });
      expect(read.status).toBe(403);
      expect(agent().requests).toEqual([]);
    });

    it('delivers a streamed response while the agent is still writing it', async () => {
      const response = await fetch(url('/proxy/session/ses_1/events'));
      const body = response.body;
      if (!body) throw new Error('expected a response body');
      const reader = body.getReader();
      const decoder = new TextDecoder();

      const first = await reader.read();

      expect(response.status).toBe(200);
      expect(decoder.decode(first.value)).toBe('data: started\n\n');
      expect(agent().openStreams).toHaveLength(1);

      agent().openStreams.forEach((finish) => finish());
      let rest = '';
      for (let chunk = await reader.read(); !chunk.done; chunk = await reader.read()) {
        rest += decoder.decode(chunk.value, { stream: true });
      }
      expect(rest).toBe('data: finished\n\n');
    });

    it('answers 404 for an unknown instance', async () => {
      const response = await fetch(`${testApp.http.baseUrl}/instances/nobody/proxy/session`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: 'No instance for correlation id nobody',
        kind: 'InstanceNotFound',
      });
    });

    it('fetches the contract once for concurrent calls', async () => {
      const responses = await Promise.all(Array.from({ length: 5 }, () => fetch(url('/proxy/session'))));
      await fetch(url('/proxy/session'));

      expect(responses.map((response) => response.status)).toEqual([200, 200, 200, 200, 200]);
      expect(agent().contractFetches).toBe(1);
      expect(harness.orchestrator.get('abc123')?.apiContract?.operations).toHaveLength(7);
    });

    it('answers 502 when the agent stops answering', async () => {
      expect((await fetch(url('/proxy/session'))).status).toBe(200);
      await harness.supervisor.crash(agent().info.pid);

      const response = await fetch(url('/proxy/session'));

      expect(response.status).toBe(502);
      expect(await response.json()).toMatchObject({ kind: 'UpstreamUnavailable' });
    });

    it('refuses instances that are not running', async () => {
      harness.registry.transition('abc123', 'draining');

      const response = await fetch(url('/proxy/session'));

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: 'Instance abc123 is draining', kind: 'UpstreamUnavailable' });
    });
  });

  describe('rate limiting', () => {
    it('limits proxied DELETE calls per window', async () => {
      await start({ proxyDeleteLimit: 2 });

      const statuses: number[] = [];
      for (let i = 0; i < 3; i++) {
        statuses.push((await fetch(url(`/proxy/session/ses_${i}`), { method: 'DELETE' })).status);
      }
      const limited = await fetch(url('/proxy/session/ses_9'), { method: 'DELETE' });
      const read = await fetch(url('/proxy/session/ses_9'));

      expect(statuses).toEqual([200, 200, 429]);
      expect(limited.status).toBe(429);
      expect(limited.headers.get('x-ratelimit-limit')).toBe('2');
      expect(await limited.json()).toMatchObject({ error: 'Rate limit exceeded', kind: 'RateLimited' });
      expect(read.status).toBe(200);
      expect(agent().requests).toEqual([
        'DELETE /session/ses_0',
        'DELETE /session/ses_1',
        'GET /session/ses_9',
      ]);
    });
  });
});

describe('ProxyService.authorize', () => {
  let harness: Harness;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    harness = await createHarness({ portRange: RANGE });
  });

  afterEach(async () => {
    await harness.cleanup();
    vi.restoreAllMocks();
  });

  const unavailable = async () => {
    throw new OrchestratorError('ContractUnavailable', 'Failed to fetch API document: HTTP 404 Not Found');
  };

  it('fails closed when the contract cannot be fetched', async () => {
    await harness.orchestrator.setup({ correlationId: 'abc123' });
    const proxy = new ProxyService({
      registry: harness.registry,
      contractPath: '/doc',
      contractFetchTimeoutMs: 1000,
      allowUnfiltered: false,
      fetchContract: unavailable,
    });

    await expect(proxy.authorize('abc123', 'GET', '/session')).rejects.toMatchObject({
      kind: 'ContractUnavailable',
    });
  });

  it('forwards unfiltered when allowed and retries the fetch next time', async () => {
    const { port } = await harness.orchestrator.setup({ correlationId: 'abc123' });
    const fetcher = vi.fn(unavailable);
    const proxy = new ProxyService({
      registry: harness.registry,
      contractPath: '/doc',
      contractFetchTimeoutMs: 1000,
      allowUnfiltered: true,
      fetchContract: fetcher,
    });

    const first = await proxy.authorize('abc123', 'DELETE', '/anything/at/all');
    await proxy.authorize('abc123', 'GET', '/other');

    expect(first).toEqual({ origin: `http://127.0.0.1:${port}`, path: '/anything/at/all' });
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(harness.registry.get('abc123')?.apiContract).toBeUndefined();
  });

  it('uses the injected fetcher result as the filter', async () => {
    await harness.orchestrator.setup({ correlationId: 'abc123' });
    const proxy = new ProxyService({
      registry: harness.registry,
      contractPath: '/doc',
      contractFetchTimeoutMs: 1000,
      allowUnfiltered: false,
      fetchContract: async () => parseContract(AGENT_DOCUMENT),
    });

    await expect(proxy.authorize('abc123', 'POST', '/session/s1/message')).resolves.toMatchObject({
      path: '/session/s1/message',
    });
    await expect(proxy.authorize('abc123', 'POST', '/session/s1')).rejects.toMatchObject({
      kind: 'RequestRejected',
      message: 'Rejected POST /session/s1: method POST is not allowed (allowed: DELETE, GET)',
    });
  });
});
