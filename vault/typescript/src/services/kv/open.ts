import { VaultClient } from '../../client/client.js';
import type { VaultConfig } from '../../config/config.js';
import { InMemoryKvStore } from '../../simulation/memory-store.js';
import { KvServiceImpl } from './service.js';
import type { KvService } from './types.js';

/** Address scheme selecting the in-memory store. */
export const MOCK_SCHEME = 'mock:';

/**
 * Opens a KV version 1 backend for `address`.
 *
 * `mock:<file>` returns an {@link InMemoryKvStore} seeded from the JSON
 * fixture `<file>` (`mock:-` for an empty store). Any other address is a
 * server URL and yields an HTTP-backed service.
 */
export async function openKvService(
  address: string,
  options: Omit<VaultConfig, 'address'> = {}
): Promise<KvService> {
  if (address.startsWith(MOCK_SCHEME)) {
    return InMemoryKvStore.fromFile(address.slice(MOCK_SCHEME.length) || '-');
  }
  return new KvServiceImpl(new VaultClient({ ...options, address }));
}
