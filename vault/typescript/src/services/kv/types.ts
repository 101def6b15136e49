import type { NotFoundOptions } from '../../errors/not-found.js';
import type { Secret } from '../../types/common.js';

/**
 * Options accepted by {@link KvService.read}
 */
export type ReadOptions<F> = NotFoundOptions<F>;

/**
 * Operations of the KV version 1 secrets engine.
 *
 * Implemented against a live server by `KvServiceImpl` and in process by
 * `InMemoryKvStore`; both raise `NotFoundError` for missing paths, so callers
 * can switch between them. Only membership of `list` results is shared
 * between backends, not their order.
 */
export interface KvService {
  /**
   * Immediate children of `path`. Directory entries end with `/`.
   *
   * @throws {NotFoundError} If nothing is stored under `path`
   */
  list(path: string): Promise<string[]>;

  /**
   * The secret stored at `path`.
   *
   * @throws {NotFoundError} Unless `options.notFound` is supplied
   */
  read(path: string): Promise<Secret>;
  read<F>(path: string, options: ReadOptions<F>): Promise<Secret | F>;

  /**
   * Creates or replaces the secret at `path`.
   */
  write(path: string, secret: Secret): Promise<true>;

  /**
   * Removes the secret at `path`; succeeds when there is none.
   */
  delete(path: string): Promise<true>;
}
