export { OAuthError, OAuthErrorCode } from './oauth-error.js';
export type { OAuthErrorOptions } from './oauth-error.js';
export { EmailError, EmailErrorCode } from './email-error.js';
export type { EmailErrorOptions } from './email-error.js';
export {
  ServiceError,
  InvalidProviderError,
  ConfigurationNotFoundError,
  InternalServiceError,
} from './service-error.js';
export { coerceErrorStatus } from './status.js';
