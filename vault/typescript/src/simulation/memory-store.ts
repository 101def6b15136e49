/**
 * In-memory KV version 1 store.
 *
 * Drop-in replacement for the HTTP-backed {@link KvService} for tests and
 * offline development. Secrets live in a tree keyed by path segment; a node
 * can hold a secret and children at the same time.
 *
 * Every operation runs synchronously to completion before its promise
 * settles, so the event loop serializes all access to the tree and no caller
 * sees a half-applied write or delete.
 *
 * `list` results are sorted by UTF-16 code unit order of the rendered entry.
 */

import { readFile } from 'node:fs/promises';
import { NotFoundError, ValidationError } from '../errors/categories.js';
import { withNotFoundFallback } from '../errors/not-found.js';
import type { ReadOptions, KvService } from '../services/kv/types.js';
import { isJsonObject } from '../transport/normalize.js';
import type { Secret } from '../types/common.js';

interface StoreNode {
  secret?: Secret;
  children: Map<string, StoreNode>;
}

function createNode(): StoreNode {
  return { children: new Map() };
}

function segments(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '');
}

function requirePath(path: unknown): string {
  if (typeof path !== 'string' || segments(path).length === 0) {
    throw new ValidationError(`Secret path must be a non-empty string, got: ${JSON.stringify(path)}`);
  }
  return path;
}

/**
 * In-memory implementation of {@link KvService}
 *
 * @example
 * ```typescript
 * const store = new InMemoryKvStore();
 * await store.write('kv/app/db', { password: 'test-secret' });
 * await store.list('kv/app'); // ['db']
 * ```
 */
export class InMemoryKvStore implements KvService {
  private readonly root: StoreNode = createNode();

  /**
   * Creates a store seeded from a JSON file of the form
   * `{ "<path>": { ...secret } }`. The name `-` yields an empty store.
   */
  static async fromFile(file: string): Promise<InMemoryKvStore> {
    const store = new InMemoryKvStore();
    if (file === '-') {
      return store;
    }

    const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));
    if (!isJsonObject(parsed)) {
      throw new ValidationError(`Secret fixture ${file} must contain a JSON object of paths`);
    }
    const entries: Record<string, Secret> = {};
    for (const [path, secret] of Object.entries(parsed)) {
      if (!isJsonObject(secret)) {
        throw new ValidationError(`Secret fixture ${file}: entry ${path} is not an object`);
      }
      entries[path] = secret;
    }
    store.load(entries);
    return store;
  }

  /**
   * Writes every entry into the store.
   */
  load(entries: Record<string, Secret>): void {
    for (const [path, secret] of Object.entries(entries)) {
      this.put(requirePath(path), secret);
    }
  }

  async list(path: string): Promise<string[]> {
    const node = this.find(requirePath(path));
    if (!node || node.children.size === 0) {
      throw new NotFoundError({ message: `No secrets listed under: ${path}` });
    }

    const entries: string[] = [];
    for (const [name, child] of node.children) {
      if (child.secret) {
        entries.push(name);
      }
      if (child.children.size > 0) {
        entries.push(`${name}/`);
      }
    }
    return entries.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  read(path: string): Promise<Secret>;
  read<F>(path: string, options: ReadOptions<F>): Promise<Secret | F>;
  async read<F>(path: string, options?: ReadOptions<F>): Promise<Secret | F | undefined> {
    return withNotFoundFallback(options, async () => {
      const secret = this.find(requirePath(path))?.secret;
      if (!secret) {
        throw new NotFoundError({ message: `No such secret: ${path}` });
      }
      return structuredClone(secret);
    });
  }

  async write(path: string, secret: Secret): Promise<true> {
    if (!isJsonObject(secret)) {
      throw new ValidationError('Secret must be an object of field names to values');
    }
    this.put(requirePath(path), secret);
    return true;
  }

  async delete(path: string): Promise<true> {
    const parts = segments(requirePath(path));

    const trail: StoreNode[] = [this.root];
    for (const part of parts) {
      const next = trail[trail.length - 1].children.get(part);
      if (!next) {
        return true;
      }
      trail.push(next);
    }

    delete trail[trail.length - 1].secret;

    // Drop nodes left holding neither a secret nor children.
    for (let depth = parts.length; depth > 0; depth--) {
      const node = trail[depth];
      if (node.secret || node.children.size > 0) {
        break;
      }
      trail[depth - 1].children.delete(parts[depth - 1]);
    }
    return true;
  }

  private put(path: string, secret: Secret): void {
    let node = this.root;
    for (const part of segments(path)) {
      let child = node.children.get(part);
      if (!child) {
        child = createNode();
        node.children.set(part, child);
      }
      node = child;
    }
    node.secret = structuredClone(secret);
  }

  private find(path: string): StoreNode | undefined {
    let node: StoreNode | undefined = this.root;
    for (const part of segments(path)) {
      node = node.children.get(part);
      if (!node) {
        return undefined;
      }
    }
    return node;
  }
}
