import type { VaultClient } from '../../client/client.js';
import { DeserializationError, ValidationError } from '../../errors/categories.js';
import type { ResponseEnvelope } from '../../types/common.js';

export const UNWRAP_PATH = 'sys/wrapping/unwrap';

/**
 * Response-wrapping operations
 */
export interface WrappingService {
  /**
   * Exchanges a single-use wrapping token for the envelope it wraps. The
   * wrapping token itself authenticates the call, so the client handle does
   * not need to be logged in.
   */
  unwrap(wrapToken: string): Promise<ResponseEnvelope>;
}

export class WrappingServiceImpl implements WrappingService {
  constructor(private readonly client: VaultClient) {}

  async unwrap(wrapToken: string): Promise<ResponseEnvelope> {
    if (typeof wrapToken !== 'string' || wrapToken.trim() === '') {
      throw new ValidationError('Wrapping token must be a non-empty string');
    }

    const { address, userAgent, headers } = this.client.getConfig();
    const response = await this.client.rawRequest({
      method: 'POST',
      url: `${address}/v1/${UNWRAP_PATH}`,
      headers: {
        'Accept': 'application/json',
        'User-Agent': userAgent,
        ...headers,
        'X-Vault-Token': wrapToken,
      },
    });

    if (!response.body) {
      throw new DeserializationError('Unwrap response had no body');
    }
    return response.body;
  }
}

export function createWrappingService(client: VaultClient): WrappingService {
  return new WrappingServiceImpl(client);
}
