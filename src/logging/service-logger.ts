import { DefaultLogger } from './logger.js';
import type { LogLevel, LogTransport, Logger } from './types.js';

export const EMAIL_OAUTH_REDACTION_PATHS = [
  // Direct fields
  'clientSecret',
  'accessToken',
  'refreshToken',
  'code',

  // Token endpoint requests and responses
  'access_token',
  'refresh_token',
  'client_secret',
  'response.data.access_token',
  'response.data.refresh_token',
  'request.headers.authorization',

  // Nested copies
  'config.clientSecret',
  'config.accessToken',
  'config.refreshToken',
  'tokenData.accessToken',
  'tokenData.refreshToken',
];

/** Redacted at any depth */
export const EMAIL_OAUTH_REDACTION_KEYS = [
  'clientSecret',
  'client_secret',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'authorization',
  'Authorization',
];

export function createServiceLogger(
  options: { level?: LogLevel; transport?: LogTransport } = {}
): Logger {
  return new DefaultLogger(
    { service: 'vendor-email-oauth' },
    {
      level: options.level,
      redactPaths: EMAIL_OAUTH_REDACTION_PATHS,
      redactKeys: EMAIL_OAUTH_REDACTION_KEYS,
    },
    options.transport
  );
}
