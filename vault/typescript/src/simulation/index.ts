export { InMemoryKvStore } from './memory-store.js';
export { InMemoryKvTransport, DEFAULT_LEASE_DURATION } from './transport.js';
export type { AccessLogEntry, InMemoryKvTransportOptions } from './transport.js';
