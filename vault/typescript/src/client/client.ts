/**
 * Vault HTTP client handle and request pipeline.
 *
 * A request is validated, authenticated with the handle's current token,
 * serialized, sent, redirected at most {@link MAX_REDIRECTS} times and its
 * outcome routed through the key-case normalizer (success) or the error
 * classifier (failure).
 *
 * @module client
 */

import { TokenCell } from '../auth/token-cell.js';
import type { AuthState } from '../auth/token-cell.js';
import { configFromEnv, MAX_REDIRECTS, validateConfig } from '../config/config.js';
import type { NormalizedVaultConfig, VaultConfig } from '../config/config.js';
import { RedirectLimitError, ValidationError } from '../errors/categories.js';
import { classifyError } from '../errors/classify.js';
import { ConsoleLogger, logError, logRequest, logResponse } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import { createHttpTransport, HttpFailure } from '../transport/http-transport.js';
import type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from '../transport/http-transport.js';
import { cleanBody } from '../transport/normalize.js';
import type { JsonValue, ResponseEnvelope } from '../types/common.js';

/** Statuses whose `Location` header is followed. */
const REDIRECT_STATUSES = new Set([303, 307]);

/**
 * Options for a single API request
 */
export interface RequestOptions {
  /** Additional headers; they cannot replace `X-Vault-Token` */
  headers?: Record<string, string>;
  /** Query parameters, e.g. `{ list: true }` */
  query?: Record<string, string | number | boolean | undefined>;
  /**
   * Request body. Strings are sent as they are, anything else is encoded
   * as JSON.
   */
  body?: string | JsonValue;
}

/**
 * Result of a successful request
 */
export interface VaultResponse {
  status: number;
  headers: Record<string, string>;
  /** Normalized envelope; `undefined` for an empty body */
  body?: ResponseEnvelope;
}

/**
 * Handle on a Vault server: address, transport, logger and the mutable
 * authentication cell. Create once and share.
 */
export class VaultClient {
  readonly auth: TokenCell;
  private readonly config: NormalizedVaultConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(config: VaultConfig) {
    this.config = validateConfig(config);
    this.transport = this.config.transport ?? createHttpTransport(this.config.timeout, this.config.fetch);
    this.logger = this.config.logger ?? new ConsoleLogger({ target: 'vault.client' });
    this.auth = new TokenCell(this.config.token ? { clientToken: this.config.token } : undefined);
  }

  get address(): string {
    return this.config.address;
  }

  getConfig(): Readonly<NormalizedVaultConfig> {
    return { ...this.config };
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Token login: installs `token` as the handle's credential.
   */
  authenticate(token: string, details?: Omit<AuthState, 'clientToken'>): void {
    this.auth.replace({ ...details, clientToken: token });
  }

  /**
   * Performs an API request relative to the `/v1/` root.
   *
   * @throws {ValidationError} If `path` is blank or has `.` or `..` segments
   * @throws {AuthenticationError} If the handle holds no token
   * @throws {RedirectLimitError} If the request is redirected too often
   * @throws {ApiError} For responses with status 400 or above
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<VaultResponse> {
    if (typeof path !== 'string' || path.trim() === '') {
      throw new ValidationError(`API path must be a non-empty string, got: ${JSON.stringify(path)}`);
    }
    if (path.split('/').some((segment) => segment === '.' || segment === '..')) {
      throw new ValidationError(`API path must not contain '.' or '..' segments, got: ${JSON.stringify(path)}`);
    }
    const token = this.auth.requireToken();

    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.config.userAgent,
      ...this.config.headers,
      ...withoutTokenHeader(options.headers),
    };

    let body: string | undefined;
    if (typeof options.body === 'string') {
      body = options.body;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
    }

    headers['X-Vault-Token'] = token;

    return this.rawRequest({ method, url, headers, body });
  }

  /**
   * Sends a prepared request against a full URL, following redirects and
   * classifying failures. No token is attached; the caller sets headers.
   */
  async rawRequest(request: HttpRequest): Promise<VaultResponse> {
    let current = request;

    for (let redirects = 0; ; redirects++) {
      if (redirects >= MAX_REDIRECTS) {
        throw new RedirectLimitError(request.method, request.url, redirects);
      }

      const response = await this.send(current, redirects);

      const location = response.headers['location'];
      if (REDIRECT_STATUSES.has(response.status) && location) {
        const next = new URL(location, current.url).toString();
        this.logger.debug('Retrying API request redirected', {
          method: current.method,
          from: current.url,
          to: next,
        });
        current = { ...current, url: next };
        continue;
      }

      return {
        status: response.status,
        headers: response.headers,
        body: cleanBody(response.body),
      };
    }
  }

  /**
   * One hop: issue the call and turn a failure status into a classified error.
   */
  private async send(request: HttpRequest, redirects: number): Promise<HttpResponse> {
    const startedAt = Date.now();
    logRequest(this.logger, request.method, request.url, request.headers, redirects);

    try {
      const response = await this.transport.send(request);
      logResponse(this.logger, request.method, request.url, response.status, Date.now() - startedAt);
      if (response.status >= 400) {
        throw new HttpFailure(response);
      }
      return response;
    } catch (error) {
      logError(this.logger, error, `${request.method} ${request.url}`);
      throw classifyError(error);
    }
  }

  private buildUrl(path: string, query?: RequestOptions['query']): string {
    const url = new URL(`${this.config.address}/v1/${encodePath(path)}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      }
    }
    return url.toString();
  }
}

/**
 * Percent-encodes each segment so `#`, `?` and `%` stay part of the secret path.
 */
function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

function withoutTokenHeader(headers?: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (name.toLowerCase() !== 'x-vault-token') {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Creates a new Vault client instance.
 */
export function createClient(config: VaultConfig): VaultClient {
  return new VaultClient(config);
}

/**
 * Create a Vault client from environment variables.
 *
 * @see configFromEnv
 */
export function createClientFromEnv(overrides: Partial<VaultConfig> = {}): VaultClient {
  return new VaultClient({ ...configFromEnv(), ...overrides });
}
