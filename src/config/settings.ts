/**
 * Service settings schema and validation
 * Provides Zod-based validation of the environment read at startup
 */

import { z } from 'zod';
import { InternalServiceError } from '../errors/service-error.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../utils/http-client.js';
import { DEFAULT_MICROSOFT_TENANT } from '../adapters/microsoft/constants.js';
import { LogLevel } from '../logging/types.js';
import { parseLogLevel } from '../logging/logger.js';

const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const ServiceSettingsSchema = z.object({
  EMAIL_OAUTH_HTTP_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce
      .number()
      .int('EMAIL_OAUTH_HTTP_TIMEOUT_MS must be a positive integer')
      .positive('EMAIL_OAUTH_HTTP_TIMEOUT_MS must be a positive integer')
      .default(DEFAULT_HTTP_TIMEOUT_MS)
  ),
  EMAIL_OAUTH_LOG_LEVEL: z.preprocess(
    (value) => {
      const unset = blankAsUnset(value);
      return typeof unset === 'string' ? unset.trim().toLowerCase() : unset;
    },
    z
      .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
      .default('info')
  ),
  EMAIL_OAUTH_DEFAULT_TENANT: z.preprocess(
    blankAsUnset,
    z.string().trim().default(DEFAULT_MICROSOFT_TENANT)
  ),
});

export type ServiceSettings = {
  httpTimeoutMs: number;
  logLevel: LogLevel;
  defaultTenantId: string;
};

/**
 * Read the service settings from environment variables
 *
 * @throws InternalServiceError listing the invalid variables
 */
export function loadServiceSettings(
  env: Record<string, string | undefined> = process.env
): ServiceSettings {
  const result = ServiceSettingsSchema.safeParse(env);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new InternalServiceError(
      `Invalid service settings: ${messages.join(', ')}`,
      result.error
    );
  }

  return {
    httpTimeoutMs: result.data.EMAIL_OAUTH_HTTP_TIMEOUT_MS,
    logLevel: parseLogLevel(result.data.EMAIL_OAUTH_LOG_LEVEL, LogLevel.Info),
    defaultTenantId: result.data.EMAIL_OAUTH_DEFAULT_TENANT,
  };
}
