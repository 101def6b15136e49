export { KvServiceImpl, createKvService } from './service.js';
export { openKvService, MOCK_SCHEME } from './open.js';
export type { KvService, ReadOptions } from './types.js';
