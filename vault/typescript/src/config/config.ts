/**
 * Configuration for the Vault client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import type { Logger } from '../observability/logging.js';
import type { FetchFunction, HttpTransport } from '../transport/http-transport.js';

/** Default request timeout in milliseconds (60 seconds). */
export const DEFAULT_TIMEOUT = 60000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'vault-kv-client/0.1.0';

/** Redirect hops a single request may take before it is aborted. */
export const MAX_REDIRECTS = 2;

/**
 * Configuration interface for the Vault client
 */
export interface VaultConfig {
  /**
   * Base address of the Vault server, e.g. `https://vault.example.com:8200`.
   */
  address: string;

  /**
   * Client token to start with. May be set later through the client's token cell.
   */
  token?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /**
   * @default 'vault-kv-client/0.1.0'
   */
  userAgent?: string;

  /**
   * Extra headers sent with every request. They cannot replace the token header.
   */
  headers?: Record<string, string>;

  /**
   * Custom transport (useful for testing or offline use)
   */
  transport?: HttpTransport;

  /**
   * Custom fetch implementation for the default transport
   */
  fetch?: FetchFunction;

  logger?: Logger;
}

/**
 * Configuration with defaults applied and the address normalized
 */
export interface NormalizedVaultConfig {
  address: string;
  token?: string;
  timeout: number;
  userAgent: string;
  headers: Record<string, string>;
  transport?: HttpTransport;
  fetch?: FetchFunction;
  logger?: Logger;
}

const configSchema = z.object({
  address: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//.test(value), {
      message: 'Address must start with http:// or https://',
    }),
  token: z.string().trim().min(1, 'Token cannot be empty').optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  userAgent: z.string().trim().min(1, 'User-Agent cannot be empty').default(DEFAULT_USER_AGENT),
  headers: z.record(z.string()).default({}),
});

/**
 * Validates and normalizes the configuration
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function validateConfig(config: VaultConfig): NormalizedVaultConfig {
  const result = configSchema.safeParse({
    address: config.address,
    token: config.token,
    timeout: config.timeout,
    userAgent: config.userAgent,
    headers: config.headers,
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid Vault configuration: ${issues.join('; ')}`, issues);
  }

  return {
    ...result.data,
    address: result.data.address.replace(/\/+$/, ''),
    transport: config.transport,
    fetch: config.fetch,
    logger: config.logger,
  };
}

/**
 * Reads configuration from the environment.
 *
 * - `VAULT_ADDR`: server address (required)
 * - `VAULT_TOKEN`: client token (optional)
 * - `VAULT_CLIENT_TIMEOUT`: request timeout in seconds (optional)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): VaultConfig {
  const address = env.VAULT_ADDR;
  if (!address) {
    throw new ConfigurationError('Vault address not found in environment variables (VAULT_ADDR)');
  }

  let timeout: number | undefined;
  if (env.VAULT_CLIENT_TIMEOUT) {
    const seconds = Number(env.VAULT_CLIENT_TIMEOUT);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigurationError(
        `VAULT_CLIENT_TIMEOUT must be a positive number of seconds, got: ${env.VAULT_CLIENT_TIMEOUT}`
      );
    }
    timeout = Math.round(seconds * 1000);
  }

  return {
    address,
    token: env.VAULT_TOKEN || undefined,
    timeout,
  };
}

/**
 * Fluent builder for creating VaultConfig objects
 */
export class VaultConfigBuilder {
  private config: Partial<VaultConfig> = {};

  withAddress(address: string): this {
    this.config.address = address;
    return this;
  }

  withToken(token: string): this {
    this.config.token = token;
    return this;
  }

  withTimeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a custom header
   */
  withHeader(key: string, value: string): this {
    this.config.headers = { ...this.config.headers, [key]: value };
    return this;
  }

  withTransport(transport: HttpTransport): this {
    this.config.transport = transport;
    return this;
  }

  withFetch(fetch: FetchFunction): this {
    this.config.fetch = fetch;
    return this;
  }

  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /**
   * Builds and validates the configuration
   */
  build(): NormalizedVaultConfig {
    const { address } = this.config;
    if (!address) {
      throw new ConfigurationError('Address is required. Use withAddress() to set it.');
    }
    return validateConfig({ ...this.config, address });
  }
}
