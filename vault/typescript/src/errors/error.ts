/**
 * Base error type for the Vault client.
 * @module errors
 */

/**
 * Classification of every failure the client raises.
 */
export type VaultErrorKind =
  | 'validation'
  | 'authentication'
  | 'configuration'
  | 'transport'
  | 'deserialization'
  | 'api'
  | 'not-found'
  | 'redirect-limit';

/** Base error options */
export interface VaultErrorOptions {
  message: string;
  /** HTTP status, when the failure came from a response */
  status?: number;
  /** Individual error strings reported by the server */
  errors?: string[];
  cause?: unknown;
}

/**
 * Base class for all Vault client errors
 */
export class VaultError extends Error {
  public readonly kind: VaultErrorKind;
  public readonly status?: number;
  public readonly errors: readonly string[];
  public override readonly cause?: unknown;

  constructor(kind: VaultErrorKind, options: VaultErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.status = options.status;
    this.errors = options.errors ?? [];
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      errors: this.errors,
    };
  }

  /**
   * Formats the error for display.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.status !== undefined) {
      result += ` (HTTP ${this.status})`;
    }
    return result;
  }
}

/**
 * Type guard for VaultError.
 */
export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError;
}
