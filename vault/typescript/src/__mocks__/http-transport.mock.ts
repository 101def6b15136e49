import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { VaultClient } from '../client/client.js';
import type { VaultConfig } from '../config/config.js';
import { NoopLogger } from '../observability/logging.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/http-transport.js';
import type { JsonObject } from '../types/common.js';

export const TEST_ADDRESS = 'https://vault.example.com';
export const TEST_TOKEN = 'test-token';

export interface MockHttpTransport extends HttpTransport {
  send: Mock<[HttpRequest], Promise<HttpResponse>>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    send: vi.fn<[HttpRequest], Promise<HttpResponse>>(),
  };
}

/**
 * Builds a raw response; object bodies are JSON-encoded.
 */
export function mockResponse(
  status: number,
  body: JsonObject | string = '',
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    status,
    headers: typeof body === 'string' ? headers : { 'content-type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

export function mockHttpTransportResponse(transport: MockHttpTransport, response: HttpResponse): void {
  transport.send.mockResolvedValue(response);
}

export function mockHttpTransportError(transport: MockHttpTransport, error: Error): void {
  transport.send.mockRejectedValue(error);
}

/**
 * The `index`-th request the transport received
 */
export function sentRequest(transport: MockHttpTransport, index = 0): HttpRequest {
  const call = transport.send.mock.calls[index];
  if (!call) {
    throw new Error(`Transport received no request #${index}`);
  }
  return call[0];
}

/**
 * A silent, authenticated client over `transport`
 */
export function createTestClient(transport: HttpTransport, overrides?: Partial<VaultConfig>): VaultClient {
  return new VaultClient({
    address: TEST_ADDRESS,
    token: TEST_TOKEN,
    transport,
    logger: new NoopLogger(),
    ...overrides,
  });
}
