import type { VaultClient } from '../../client/client.js';
import { DeserializationError, ValidationError } from '../../errors/categories.js';
import { withNotFoundFallback } from '../../errors/not-found.js';
import { isJsonObject } from '../../transport/normalize.js';
import type { ResponseEnvelope, Secret } from '../../types/common.js';
import type { KvService, ReadOptions } from './types.js';

function envelopeData(body: ResponseEnvelope | undefined): Secret {
  const data = body?.data;
  if (data === undefined) {
    return {};
  }
  if (!isJsonObject(data)) {
    throw new DeserializationError(`Expected secret data to be an object, got: ${JSON.stringify(data)}`);
  }
  return data;
}

/**
 * KV version 1 operations over a {@link VaultClient}
 */
export class KvServiceImpl implements KvService {
  constructor(private readonly client: VaultClient) {}

  async list(path: string): Promise<string[]> {
    const response = await this.client.request('GET', path, { query: { list: true } });
    const keys = envelopeData(response.body).keys;

    if (Array.isArray(keys) && keys.every((key): key is string => typeof key === 'string')) {
      return keys;
    }
    throw new DeserializationError(`Expected a list of keys under ${path}, got: ${JSON.stringify(keys)}`);
  }

  read(path: string): Promise<Secret>;
  read<F>(path: string, options: ReadOptions<F>): Promise<Secret | F>;
  async read<F>(path: string, options?: ReadOptions<F>): Promise<Secret | F | undefined> {
    return withNotFoundFallback(options, async () => {
      const response = await this.client.request('GET', path);
      return envelopeData(response.body);
    });
  }

  async write(path: string, secret: Secret): Promise<true> {
    if (!isJsonObject(secret)) {
      throw new ValidationError('Secret must be an object of field names to values');
    }
    await this.client.request('POST', path, { body: secret });
    return true;
  }

  async delete(path: string): Promise<true> {
    await this.client.request('DELETE', path);
    return true;
  }
}

export function createKvService(client: VaultClient): KvService {
  return new KvServiceImpl(client);
}
