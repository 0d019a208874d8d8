/**
 * Vendor Email OAuth
 * Main entry point: provider adapters, registry, service facade and bootstrap
 */

export const version = '0.1.0';

// Export all adapters
export * from './adapters/index.js';

// Registry, service facade and bootstrap
export * from './registry/index.js';
export * from './service/index.js';
export * from './config/index.js';

// Persistence hook and the in-memory store
export * from './storage/index.js';

// Error taxonomy
export * from './errors/index.js';

// Token lifecycle and state parameter
export {
  TOKEN_EXPIRY_LOOKAHEAD_MS,
  DEFAULT_EXPIRES_IN_SECONDS,
  computeExpiresAt,
  isTokenExpired,
  isTokenExpiringSoon,
  needsRefresh,
  secondsUntilExpiration,
} from './token-lifecycle.js';
export { encodeAuthState, decodeAuthState } from './auth-state.js';
export type { AuthState } from './auth-state.js';

export {
  PROVIDER_GOOGLE,
  PROVIDER_MICROSOFT,
  VALID_PROVIDERS,
  isProviderName,
} from './types.js';
export type {
  ProviderName,
  VendorEmailConfiguration,
  ConfigurationInput,
  TokenData,
  EmailData,
  EmailContentType,
  UserInfo,
  ProviderQuirks,
} from './types.js';

// Export utilities
export { ErrorNormalizer } from './utils/error-normalizer.js';
export type { ErrorResponse, ErrorResponseBody } from './utils/error-normalizer.js';
export { validateEmailData } from './validation/email-validation.js';
export { validateConfigurationInput } from './validation/configuration-schema.js';

// Export logging utilities
export { LogLevel, LogDestination } from './logging/types.js';
export type { Logger, LogMeta, LogTransport } from './logging/types.js';
export { DefaultLogger } from './logging/logger.js';
export { createServiceLogger } from './logging/service-logger.js';

export default {
  version,
};
