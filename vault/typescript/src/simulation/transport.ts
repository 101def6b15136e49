/**
 * HTTP transport that answers KV version 1 requests from an
 * {@link InMemoryKvStore}, speaking the same wire format as a Vault server
 * (snake_case envelopes, `{"errors": [...]}` failures, 204 for writes).
 *
 * Plugging it into a `VaultClient` runs the whole request pipeline with no
 * network.
 */

import { randomUUID } from 'node:crypto';
import { isVaultError } from '../errors/error.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/http-transport.js';
import { denormalizeEnvelope, isJsonObject } from '../transport/normalize.js';
import type { JsonObject, ResponseEnvelope, Secret } from '../types/common.js';
import { InMemoryKvStore } from './memory-store.js';

/** Lease duration the KV v1 engine reports by default (768h). */
export const DEFAULT_LEASE_DURATION = 2764800;

const UNWRAP_PATH = 'sys/wrapping/unwrap';

/**
 * One request seen by the transport, for assertions
 */
export interface AccessLogEntry {
  method: string;
  path: string;
  list: boolean;
  token?: string;
}

export interface InMemoryKvTransportOptions {
  /** Tokens accepted for KV calls. When omitted any non-empty token is accepted. */
  tokens?: string[];
}

function jsonResponse(status: number, body: JsonObject): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function errorResponse(status: number, errors: string[]): HttpResponse {
  return jsonResponse(status, { errors });
}

function noContent(): HttpResponse {
  return { status: 204, headers: {}, body: '' };
}

function envelope(data: JsonObject, leaseDuration = DEFAULT_LEASE_DURATION): HttpResponse {
  const body: ResponseEnvelope = {
    'request-id': randomUUID(),
    'lease-id': '',
    'renewable': false,
    'lease-duration': leaseDuration,
    data,
  };
  return jsonResponse(200, denormalizeEnvelope(body));
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

export class InMemoryKvTransport implements HttpTransport {
  private readonly accessLog: AccessLogEntry[] = [];
  private readonly wrapped = new Map<string, Secret>();
  private readonly tokens?: ReadonlySet<string>;

  constructor(
    readonly store: InMemoryKvStore = new InMemoryKvStore(),
    options: InMemoryKvTransportOptions = {}
  ) {
    this.tokens = options.tokens ? new Set(options.tokens) : undefined;
  }

  /**
   * Wraps `secret` behind a single-use token for `sys/wrapping/unwrap`.
   */
  wrap(secret: Secret): string {
    const token = `wrap.${randomUUID()}`;
    this.wrapped.set(token, structuredClone(secret));
    return token;
  }

  getAccessLog(): readonly AccessLogEntry[] {
    return [...this.accessLog];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    if (!url.pathname.startsWith('/v1/')) {
      return errorResponse(404, [`unsupported path: ${url.pathname}`]);
    }

    let path: string;
    try {
      path = url.pathname.slice('/v1/'.length).split('/').map(decodeURIComponent).join('/');
    } catch (error) {
      if (error instanceof URIError) {
        return errorResponse(400, [`invalid path encoding: ${url.pathname}`]);
      }
      throw error;
    }
    const list = url.searchParams.get('list') === 'true';
    const token = headerValue(request.headers, 'X-Vault-Token');
    this.accessLog.push({ method: request.method, path, list, token });

    if (path === UNWRAP_PATH && request.method === 'POST') {
      return this.unwrap(token);
    }
    if (!token || (this.tokens && !this.tokens.has(token))) {
      return errorResponse(403, ['permission denied']);
    }

    try {
      return await this.dispatch(request, path, list);
    } catch (error) {
      if (isVaultError(error) && error.kind === 'not-found') {
        return errorResponse(404, []);
      }
      if (isVaultError(error) && error.kind === 'validation') {
        return errorResponse(400, [error.message]);
      }
      throw error;
    }
  }

  private async dispatch(request: HttpRequest, path: string, list: boolean): Promise<HttpResponse> {
    switch (request.method) {
      case 'GET':
        if (list) {
          return envelope({ keys: await this.store.list(path) }, 0);
        }
        return envelope(await this.store.read(path));

      case 'POST':
      case 'PUT': {
        let secret: unknown;
        try {
          secret = JSON.parse(request.body ?? '');
        } catch {
          return errorResponse(400, ['failed to parse JSON input']);
        }
        if (!isJsonObject(secret)) {
          return errorResponse(400, ['request body must be a JSON object']);
        }
        await this.store.write(path, secret);
        return noContent();
      }

      case 'DELETE':
        await this.store.delete(path);
        return noContent();

      default:
        return errorResponse(405, ['unsupported operation']);
    }
  }

  private unwrap(token: string | undefined): HttpResponse {
    const secret = token ? this.wrapped.get(token) : undefined;
    if (!token || !secret) {
      return errorResponse(400, ['wrapping token is not valid or does not exist']);
    }
    this.wrapped.delete(token);
    return envelope(secret, 0);
  }
}
