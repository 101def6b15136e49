export { VaultError, isVaultError } from './error.js';
export type { VaultErrorKind, VaultErrorOptions } from './error.js';
export {
  ValidationError,
  AuthenticationError,
  ConfigurationError,
  TransportError,
  DeserializationError,
  ApiError,
  NotFoundError,
  RedirectLimitError,
  isNotFoundError,
} from './categories.js';
export { classifyError } from './classify.js';
export { withNotFoundFallback } from './not-found.js';
export type { NotFoundOptions } from './not-found.js';
