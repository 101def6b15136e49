/**
 * vault-kv-client
 *
 * TypeScript client for the Vault KV version 1 secrets engine, with an
 * in-memory backend that honors the same contract.
 *
 * @example
 * ```typescript
 * import { createClient, createKvService } from 'vault-kv-client';
 *
 * const client = createClient({ address: 'https://vault.example.com:8200' });
 * client.authenticate(process.env.VAULT_TOKEN ?? '');
 *
 * const kv = createKvService(client);
 * await kv.write('kv/app/db', { username: 'app', password: 'test-secret' });
 * const secret = await kv.read('kv/app/db');
 * const missing = await kv.read('kv/app/cache', { notFound: null });
 * ```
 *
 * @packageDocumentation
 */

// Client exports
export { VaultClient, createClient, createClientFromEnv } from './client/client.js';
export type { RequestOptions, VaultResponse } from './client/client.js';

// Auth exports
export { TokenCell } from './auth/token-cell.js';
export type { AuthState } from './auth/token-cell.js';

// Configuration exports
export {
  VaultConfigBuilder,
  validateConfig,
  configFromEnv,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  MAX_REDIRECTS,
} from './config/config.js';
export type { VaultConfig, NormalizedVaultConfig } from './config/config.js';

// Error exports
export * from './errors/index.js';

// Service exports
export { KvServiceImpl, createKvService, openKvService, MOCK_SCHEME } from './services/kv/index.js';
export type { KvService, ReadOptions } from './services/kv/index.js';
export { WrappingServiceImpl, createWrappingService, UNWRAP_PATH } from './services/wrapping/index.js';
export type { WrappingService } from './services/wrapping/index.js';

// Transport exports
export { FetchHttpTransport, HttpFailure, createHttpTransport } from './transport/http-transport.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  FetchFunction,
  FetchInit,
  FetchResponse,
} from './transport/http-transport.js';
export {
  swapKeyChars,
  kebabifyKeys,
  snakeifyKeys,
  normalizeEnvelope,
  denormalizeEnvelope,
  cleanBody,
} from './transport/normalize.js';

// Simulation exports
export * from './simulation/index.js';

// Observability exports
export { ConsoleLogger, NoopLogger, createDefaultLoggingConfig } from './observability/logging.js';
export type { Logger, LogLevel, LogFormat, LoggingConfig } from './observability/logging.js';

// Type exports
export type { JsonPrimitive, JsonValue, JsonObject, Secret, ResponseEnvelope } from './types/common.js';
