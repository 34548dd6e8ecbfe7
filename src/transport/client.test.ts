import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getTransportError, TransportError } from '../error/transportError.js';
import { FetchTransport } from './client.js';

const { fetchMock, agentOptions, proxyOptions, closeMock } = vi.hoisted(() => ({
  fetchMock: vi.fn(),
  agentOptions: new Array<unknown>(),
  proxyOptions: new Array<unknown>(),
  closeMock: vi.fn(async () => {}),
}));

vi.mock('undici', () => {
  class Agent {
    close = closeMock;
    constructor(opts: unknown) {
      agentOptions.push(opts);
    }
  }

  class ProxyAgent {
    close = closeMock;
    constructor(opts: unknown) {
      proxyOptions.push(opts);
    }
  }

  return { Agent, ProxyAgent, fetch: fetchMock };
});

describe('FetchTransport', () => {
  beforeEach(() => {
    agentOptions.length = 0;
    proxyOptions.length = 0;
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('dispatcher', () => {
    it('creates an agent verifying TLS by default', () => {
      new FetchTransport();

      expect(proxyOptions).toHaveLength(0);
      expect(agentOptions).toEqual([{ connect: { rejectUnauthorized: true } }]);
    });

    it('maps timeouts and disabled verification onto the agent', () => {
      new FetchTransport({ connectTimeout: 2_000, readTimeout: 5_000, verifySSL: false });

      expect(agentOptions).toEqual([
        {
          headersTimeout: 5_000,
          bodyTimeout: 5_000,
          connect: { rejectUnauthorized: false, timeout: 2_000 },
        },
      ]);
    });

    it('routes through a proxy agent when a proxy is configured', () => {
      new FetchTransport({ proxy: 'proxy.local:3128', verifySSL: false });

      expect(agentOptions).toHaveLength(0);
      expect(proxyOptions).toEqual([
        {
          uri: 'http://proxy.local:3128',
          requestTls: { rejectUnauthorized: false },
          proxyTls: { rejectUnauthorized: false },
        },
      ]);
    });

    it('keeps a proxy given as a URL untouched', () => {
      new FetchTransport({ proxy: 'https://proxy.local:8443' });

      expect(proxyOptions).toHaveLength(1);
      expect(proxyOptions[0]).toMatchObject({ uri: 'https://proxy.local:8443' });
    });
  });

  describe('execute', () => {
    it('sends the request through the dispatcher and reads the full response', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"ok":true}', { status: 201, headers: { 'Content-Type': 'application/json' } }),
      );

      const transport = new FetchTransport();
      const [err, res] = await transport.execute({
        method: 'POST',
        url: 'https://api.example.com/items',
        headers: new Headers({ 'X-Trace': 'abc' }),
        body: '{"name":"widget"}',
      });

      expect(err).toBeNull();
      expect(res?.status).toBe(201);
      expect(res?.headers.get('content-type')).toBe('application/json');
      expect(new TextDecoder().decode(res?.body)).toBe('{"ok":true}');
      expect(res?.elapsedMs).toBeGreaterThanOrEqual(0);

      expect(fetchMock).toHaveBeenCalledOnce();
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.example.com/items');
      expect(init).toMatchObject({
        method: 'POST',
        headers: { 'x-trace': 'abc' },
        body: '{"name":"widget"}',
      });
      expect(init.dispatcher).toBeDefined();
    });

    it('returns error statuses as plain responses', async () => {
      fetchMock.mockResolvedValueOnce(new Response('not found', { status: 404 }));

      const transport = new FetchTransport();
      const [err, res] = await transport.execute({
        method: 'GET',
        url: 'https://api.example.com/missing',
        headers: new Headers(),
      });

      expect(err).toBeNull();
      expect(res?.status).toBe(404);
      expect(new TextDecoder().decode(res?.body)).toBe('not found');
    });

    it('wraps network failures in a TransportError keeping the original cause', async () => {
      const refused = new TypeError('fetch failed');
      fetchMock.mockRejectedValueOnce(refused);

      const transport = new FetchTransport();
      const [err, res] = await transport.execute({
        method: 'GET',
        url: 'https://api.example.com/items',
        headers: new Headers(),
      });

      expect(res).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      expect(err?.message).toBe('error executing GET https://api.example.com/items');
      expect(getTransportError(err)?.cause).toBe(refused);
    });

    it('wraps body read failures in a TransportError', async () => {
      const aborted = new Error('body timeout');
      fetchMock.mockResolvedValueOnce({
        status: 200,
        headers: new Headers(),
        arrayBuffer: () => Promise.reject(aborted),
      });

      const transport = new FetchTransport();
      const [err] = await transport.execute({
        method: 'GET',
        url: 'https://api.example.com/slow',
        headers: new Headers(),
      });

      expect(err).toBeInstanceOf(TransportError);
      expect(err?.cause).toBe(aborted);
    });
  });

  it('closes the dispatcher', async () => {
    const transport = new FetchTransport();
    await transport.close();

    expect(closeMock).toHaveBeenCalledOnce();
  });
});
