/**
 * Authentication state held by a client handle.
 *
 * Login methods live outside this package; they hand their result to
 * {@link TokenCell.replace}. Each replacement swaps in a new frozen object, so
 * a request that already read the state keeps using the token it saw.
 *
 * @module auth
 */

import { AuthenticationError, ValidationError } from '../errors/categories.js';

export interface AuthState {
  clientToken: string;
  accessor?: string;
  policies?: readonly string[];
  /** Lease duration of the token in seconds */
  leaseDuration?: number;
  renewable?: boolean;
}

export class TokenCell {
  private state?: Readonly<AuthState>;

  constructor(initial?: AuthState) {
    if (initial) {
      this.replace(initial);
    }
  }

  /**
   * Current state, or `undefined` when the handle is unauthenticated
   */
  current(): Readonly<AuthState> | undefined {
    return this.state;
  }

  /**
   * The current client token.
   *
   * @throws {AuthenticationError} If no token is present
   */
  requireToken(): string {
    const token = this.state?.clientToken;
    if (!token) {
      throw new AuthenticationError('Cannot call API path with unauthenticated client.');
    }
    return token;
  }

  replace(next: AuthState): void {
    if (typeof next.clientToken !== 'string' || next.clientToken.trim() === '') {
      throw new ValidationError('Client token must be a non-empty string');
    }
    this.state = Object.freeze({
      ...next,
      policies: next.policies ? Object.freeze([...next.policies]) : undefined,
    });
  }

  clear(): void {
    this.state = undefined;
  }
}
