import { fetch } from 'undici';
import { TransportError } from '../errors/categories.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A single HTTP exchange, addressed by absolute URL
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Raw response as received; header names are lower-cased
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Interface for HTTP transport layer.
 *
 * Implementations return every response, whatever its status, and never
 * follow redirects themselves. They throw only for connection-level failures.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Minimal subset of the fetch API the transport relies on
 */
export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  redirect: 'manual';
  signal: AbortSignal;
}

export interface FetchResponse {
  status: number;
  headers: {
    forEach(callback: (value: string, key: string) => void): void;
  };
  text(): Promise<string>;
}

export type FetchFunction = (url: string, init: FetchInit) => Promise<FetchResponse>;

const undiciFetch: FetchFunction = (url, init) => fetch(url, init);

/**
 * Raised by the request pipeline for a response it will not return as data.
 * Carries the raw status, headers and body so the error classifier can
 * inspect them; `error` is set when the exchange broke after a status was
 * received.
 */
export class HttpFailure extends Error {
  public readonly status: number;
  public readonly headers: Record<string, string>;
  public readonly body: string;
  public readonly error?: Error;

  constructor(response: HttpResponse, error?: Error) {
    super(error ? `Error in API response: ${error.message}` : `status: ${response.status}`);
    this.name = 'HttpFailure';
    this.status = response.status;
    this.headers = response.headers;
    this.body = response.body;
    this.error = error;
  }
}

/**
 * Implementation of HttpTransport using undici's fetch
 */
export class FetchHttpTransport implements HttpTransport {
  constructor(
    private readonly timeout: number,
    private readonly fetchImpl: FetchFunction = undiciFetch
  ) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: FetchResponse;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: 'manual',
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeoutId);
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${this.timeout}ms`, request.url, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Network request failed: ${reason}`, request.url, error);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    try {
      const body = await response.text();
      return { status: response.status, headers, body };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new HttpFailure({ status: response.status, headers, body: '' }, cause);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Creates an HTTP transport instance
 */
export function createHttpTransport(timeout: number, fetchImpl?: FetchFunction): HttpTransport {
  return new FetchHttpTransport(timeout, fetchImpl);
}
