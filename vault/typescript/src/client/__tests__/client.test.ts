import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createClientFromEnv, VaultClient } from '../client.js';
import {
  ApiError,
  AuthenticationError,
  NotFoundError,
  RedirectLimitError,
  TransportError,
  ValidationError,
} from '../../errors/categories.js';
import {
  createMockHttpTransport,
  createTestClient,
  mockHttpTransportError,
  mockHttpTransportResponse,
  mockResponse,
  sentRequest,
  TEST_ADDRESS,
  TEST_TOKEN,
} from '../../__mocks__/http-transport.mock.js';
import type { MockHttpTransport } from '../../__mocks__/http-transport.mock.js';
import { NoopLogger } from '../../observability/logging.js';
import type { Logger } from '../../observability/logging.js';
import { KvServiceImpl } from '../../services/kv/service.js';
import { InMemoryKvTransport } from '../../simulation/transport.js';

describe('VaultClient', () => {
  let transport: MockHttpTransport;
  let client: VaultClient;

  beforeEach(() => {
    transport = createMockHttpTransport();
    client = createTestClient(transport);
  });

  describe('request validation', () => {
    it('rejects an empty path before sending anything', async () => {
      await expect(client.request('GET', '')).rejects.toThrow(ValidationError);
      await expect(client.request('GET', '   ')).rejects.toThrow('API path must be a non-empty string, got: "   "');
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('rejects a non-string path', async () => {
      const pending: Promise<unknown> = Reflect.apply(client.request, client, ['GET', 42]);

      await expect(pending).rejects.toThrow('API path must be a non-empty string, got: 42');
    });

    it('rejects an unauthenticated client before sending anything', async () => {
      const anonymous = createTestClient(transport, { token: undefined });

      await expect(anonymous.request('GET', 'kv/foo')).rejects.toThrow(AuthenticationError);
      await expect(anonymous.request('GET', 'kv/foo')).rejects.toThrow(
        'Cannot call API path with unauthenticated client.'
      );
      expect(transport.send).not.toHaveBeenCalled();
    });
  });

  describe('request construction', () => {
    it('sends to /v1/<path> with the token header', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      await client.request('GET', 'kv/foo/bar');

      const request = sentRequest(transport);
      expect(request.method).toBe('GET');
      expect(request.url).toBe(`${TEST_ADDRESS}/v1/kv/foo/bar`);
      expect(request.headers['X-Vault-Token']).toBe(TEST_TOKEN);
      expect(request.headers['Accept']).toBe('application/json');
      expect(request.body).toBeUndefined();
    });

    it('appends query flags', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      await client.request('GET', 'kv/foo', { query: { list: true, skip: undefined } });

      expect(sentRequest(transport).url).toBe(`${TEST_ADDRESS}/v1/kv/foo?list=true`);
    });

    it('encodes structured bodies as JSON', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      await client.request('POST', 'kv/foo', { body: { foo: 'bar', zip: 'zap' } });

      const request = sentRequest(transport);
      expect(request.body).toBe('{"foo":"bar","zip":"zap"}');
      expect(request.headers['Content-Type']).toBe('application/json');
    });

    it('sends string bodies unchanged', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      await client.request('POST', 'kv/foo', { body: 'raw text' });

      const request = sentRequest(transport);
      expect(request.body).toBe('raw text');
      expect(request.headers['Content-Type']).toBeUndefined();
    });

    it('merges configured and caller headers without letting them replace the token', async () => {
      const configured = createTestClient(transport, { headers: { 'X-Vault-Namespace': 'team-a' } });
      mockHttpTransportResponse(transport, mockResponse(204));

      await configured.request('GET', 'kv/foo', {
        headers: { 'X-Request-Id': 'req-1', 'x-vault-token': 'forged', 'X-Vault-Token': 'forged' },
      });

      const headers = sentRequest(transport).headers;
      expect(headers['X-Vault-Namespace']).toBe('team-a');
      expect(headers['X-Request-Id']).toBe('req-1');
      expect(headers['X-Vault-Token']).toBe(TEST_TOKEN);
      expect(headers['x-vault-token']).toBeUndefined();
    });

    it('uses the token current at call time', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      client.authenticate('rotated-token');
      await client.request('GET', 'kv/foo');

      expect(sentRequest(transport).headers['X-Vault-Token']).toBe('rotated-token');
    });

    it('keeps the token it started with when the cell is replaced mid-request', async () => {
      const gate: { release?: () => void } = {};
      transport.send.mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            gate.release = () => resolve(mockResponse(307, '', { location: `${TEST_ADDRESS}/v1/kv/moved` }));
          })
      );
      transport.send.mockResolvedValueOnce(mockResponse(204));

      const pending = client.request('GET', 'kv/foo');
      client.authenticate('replacement-token');
      gate.release?.();
      await pending;

      expect(sentRequest(transport, 0).headers['X-Vault-Token']).toBe(TEST_TOKEN);
      expect(sentRequest(transport, 1).headers['X-Vault-Token']).toBe(TEST_TOKEN);
    });
  });

  describe('path encoding', () => {
    beforeEach(() => {
      mockHttpTransportResponse(transport, mockResponse(204));
    });

    it('keeps # inside the secret path', async () => {
      await client.request('POST', 'kv/a#b', { body: { other: true } });

      expect(sentRequest(transport).url).toBe(`${TEST_ADDRESS}/v1/kv/a%23b`);
    });

    it('keeps ? and = inside the secret path', async () => {
      await client.request('POST', 'kv/x?list=true', { body: { a: 1 } });

      expect(sentRequest(transport).url).toBe(`${TEST_ADDRESS}/v1/kv/x%3Flist%3Dtrue`);
    });

    it('encodes % and spaces while keeping the delimiters', async () => {
      await client.request('GET', 'kv/50%off/my secret', { query: { list: true } });

      expect(sentRequest(transport).url).toBe(`${TEST_ADDRESS}/v1/kv/50%25off/my%20secret?list=true`);
    });

    it('rejects . and .. segments before sending anything', async () => {
      await expect(client.request('DELETE', 'kv/../sys/mounts/kv')).rejects.toThrow(ValidationError);
      await expect(client.request('GET', './kv/foo')).rejects.toThrow(
        `API path must not contain '.' or '..' segments, got: "./kv/foo"`
      );
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('allows dots inside a segment', async () => {
      await client.request('GET', 'kv/app.config/..hidden');

      expect(sentRequest(transport).url).toBe(`${TEST_ADDRESS}/v1/kv/app.config/..hidden`);
    });

    it('stores paths with reserved characters as distinct secrets', async () => {
      const kv = new KvServiceImpl(createTestClient(new InMemoryKvTransport()));

      await kv.write('kv/a', { original: true });
      await kv.write('kv/a#b', { other: true });
      await kv.write('kv/50%off', { discount: 50 });

      await expect(kv.read('kv/a')).resolves.toEqual({ original: true });
      await expect(kv.read('kv/a#b')).resolves.toEqual({ other: true });
      await expect(kv.read('kv/50%off')).resolves.toEqual({ discount: 50 });
      await expect(kv.list('kv')).resolves.toEqual(['50%off', 'a', 'a#b']);
    });
  });

  describe('responses', () => {
    it('normalizes the envelope and preserves data keys', async () => {
      mockHttpTransportResponse(
        transport,
        mockResponse(200, {
          auth: null,
          data: { foo_bar: 'baz' },
          lease_duration: 3600,
          lease_id: '',
          renewable: false,
        })
      );

      const response = await client.request('GET', 'kv/foo');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        'data': { foo_bar: 'baz' },
        'lease-duration': 3600,
        'lease-id': '',
        'renewable': false,
      });
    });

    it('returns an undefined body for 204', async () => {
      mockHttpTransportResponse(transport, mockResponse(204));

      const response = await client.request('DELETE', 'kv/foo');

      expect(response).toEqual({ status: 204, headers: {}, body: undefined });
    });

    it('classifies failure statuses', async () => {
      mockHttpTransportResponse(transport, mockResponse(403, { errors: ['permission denied'] }));

      const error = await client.request('GET', 'kv/secret').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        status: 403,
        errors: ['permission denied'],
        message: 'Vault API server errors: permission denied',
      });
    });

    it('classifies 404 as not found', async () => {
      mockHttpTransportResponse(transport, mockResponse(404));

      await expect(client.request('GET', 'kv/none')).rejects.toThrow(NotFoundError);
    });

    it('passes transport failures through unchanged', async () => {
      const failure = new TransportError('Network request failed: ECONNREFUSED', `${TEST_ADDRESS}/v1/kv/foo`);
      mockHttpTransportError(transport, failure);

      await expect(client.request('GET', 'kv/foo')).rejects.toBe(failure);
    });
  });

  describe('redirects', () => {
    it('re-issues the request once to the Location of a 307', async () => {
      transport.send
        .mockResolvedValueOnce(mockResponse(307, '', { location: 'https://standby.example.com/v1/kv/foo' }))
        .mockResolvedValueOnce(mockResponse(200, { data: { key: 'xyz' } }));

      const response = await client.request('POST', 'kv/foo', { body: { key: 'xyz' } });

      expect(transport.send).toHaveBeenCalledTimes(2);
      const redirected = sentRequest(transport, 1);
      expect(redirected.method).toBe('POST');
      expect(redirected.url).toBe('https://standby.example.com/v1/kv/foo');
      expect(redirected.body).toBe('{"key":"xyz"}');
      expect(redirected.headers['X-Vault-Token']).toBe(TEST_TOKEN);
      expect(response.body).toEqual({ data: { key: 'xyz' } });
    });

    it('follows a 303 with the same method', async () => {
      transport.send
        .mockResolvedValueOnce(mockResponse(303, '', { location: '/v1/kv/elsewhere' }))
        .mockResolvedValueOnce(mockResponse(204));

      await client.request('DELETE', 'kv/foo');

      const redirected = sentRequest(transport, 1);
      expect(redirected.method).toBe('DELETE');
      expect(redirected.url).toBe(`${TEST_ADDRESS}/v1/kv/elsewhere`);
    });

    it('returns a redirect status without Location as a response', async () => {
      mockHttpTransportResponse(transport, mockResponse(307));

      const response = await client.request('GET', 'kv/foo');

      expect(response.status).toBe(307);
      expect(transport.send).toHaveBeenCalledTimes(1);
    });

    it('aborts a redirect chain without issuing a third request', async () => {
      transport.send
        .mockResolvedValueOnce(mockResponse(307, '', { location: 'https://a.example.com/v1/kv/foo' }))
        .mockResolvedValueOnce(mockResponse(307, '', { location: 'https://b.example.com/v1/kv/foo' }))
        .mockResolvedValueOnce(mockResponse(307, '', { location: 'https://c.example.com/v1/kv/foo' }));

      const error = await client.request('GET', 'kv/foo').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RedirectLimitError);
      expect(error).toMatchObject({
        kind: 'redirect-limit',
        method: 'GET',
        url: `${TEST_ADDRESS}/v1/kv/foo`,
        redirects: 2,
        message: `Aborting Vault API request after 2 redirects: GET ${TEST_ADDRESS}/v1/kv/foo`,
      });
      expect(transport.send).toHaveBeenCalledTimes(2);
    });
  });

  describe('logging', () => {
    it('logs requests with the token redacted', async () => {
      const logger: Logger = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const logged = createTestClient(transport, { logger });
      mockHttpTransportResponse(transport, mockResponse(204));

      await logged.request('GET', 'kv/foo');

      expect(logger.debug).toHaveBeenCalledWith(
        'Outgoing request',
        expect.objectContaining({
          method: 'GET',
          url: `${TEST_ADDRESS}/v1/kv/foo`,
          headers: expect.objectContaining({ 'X-Vault-Token': '[REDACTED]' }),
          redirects: 0,
        })
      );
      expect(logger.debug).toHaveBeenCalledWith(
        'Incoming response',
        expect.objectContaining({ status: 204 })
      );
    });
  });

  describe('accessors', () => {
    it('returns the configured logger', () => {
      const logger = new NoopLogger();

      expect(createTestClient(transport, { logger }).getLogger()).toBe(logger);
    });
  });
});

describe('createClientFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads the address and token from the environment', async () => {
    vi.stubEnv('VAULT_ADDR', 'https://vault.example.com/');
    vi.stubEnv('VAULT_TOKEN', 'test-token');
    vi.stubEnv('VAULT_CLIENT_TIMEOUT', '');
    const transport = createMockHttpTransport();
    mockHttpTransportResponse(transport, mockResponse(204));

    const client = createClientFromEnv({ transport, logger: new NoopLogger() });
    await client.request('GET', 'kv/foo');

    expect(client.address).toBe('https://vault.example.com');
    expect(client.getConfig().timeout).toBe(60000);
    expect(sentRequest(transport).headers['X-Vault-Token']).toBe('test-token');
  });

  it('lets overrides replace environment values', () => {
    vi.stubEnv('VAULT_ADDR', 'https://vault.example.com');
    vi.stubEnv('VAULT_TOKEN', 'test-token');
    vi.stubEnv('VAULT_CLIENT_TIMEOUT', '');

    const client = createClientFromEnv({ token: 'override-token', logger: new NoopLogger() });

    expect(client.auth.requireToken()).toBe('override-token');
  });
});
