export { WrappingServiceImpl, createWrappingService, UNWRAP_PATH } from './service.js';
export type { WrappingService } from './service.js';
