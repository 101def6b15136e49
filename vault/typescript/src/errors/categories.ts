import { VaultError } from './error.js';
import type { VaultErrorOptions } from './error.js';

/**
 * Malformed input (empty or non-string path, bad secret). Raised before any
 * network activity.
 */
export class ValidationError extends VaultError {
  constructor(message: string) {
    super('validation', { message });
  }
}

/**
 * The client handle has no token. Raised before any network activity.
 */
export class AuthenticationError extends VaultError {
  constructor(message: string) {
    super('authentication', { message });
  }
}

/**
 * Invalid client configuration
 */
export class ConfigurationError extends VaultError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', { message, errors: issues });
    this.issues = issues;
  }
}

/**
 * Connection-level failure (refused, reset, timed out) with no HTTP status
 */
export class TransportError extends VaultError {
  public readonly url: string;

  constructor(message: string, url: string, cause?: unknown) {
    super('transport', { message, cause });
    this.url = url;
  }
}

/**
 * Response body could not be decoded into the expected shape
 */
export class DeserializationError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super('deserialization', { message, cause });
  }
}

/**
 * Classified failure response from the Vault API
 */
export class ApiError extends VaultError {
  constructor(options: VaultErrorOptions, kind: 'api' | 'not-found' = 'api') {
    super(kind, options);
  }
}

/**
 * Missing secret or path (404)
 */
export class NotFoundError extends ApiError {
  constructor(options: Omit<VaultErrorOptions, 'status'>) {
    super({ ...options, status: 404 }, 'not-found');
  }
}

/**
 * A request was redirected more times than the client follows
 */
export class RedirectLimitError extends VaultError {
  public readonly method: string;
  public readonly url: string;
  public readonly redirects: number;

  constructor(method: string, url: string, redirects: number) {
    super('redirect-limit', {
      message: `Aborting Vault API request after ${redirects} redirects: ${method} ${url}`,
    });
    this.method = method;
    this.url = url;
    this.redirects = redirects;
  }
}

/**
 * True for not-found failures from either the API or the in-memory store
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
