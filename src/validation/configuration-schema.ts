/**
 * Configuration input schema and validation
 * Provides Zod-based validation for store-configuration requests
 */

import { z } from 'zod';
import { StatusCodes } from 'http-status-codes';
import { OAuthError } from '../errors/oauth-error.js';
import type { ConfigurationInput } from '../types.js';

export const ConfigurationInputSchema = z.object({
  vendorId: z
    .number({ invalid_type_error: 'vendorId must be a positive integer' })
    .int('vendorId must be a positive integer')
    .positive('vendorId must be a positive integer'),
  locationId: z
    .number({ invalid_type_error: 'locationId must be a positive integer' })
    .int('locationId must be a positive integer')
    .positive('locationId must be a positive integer'),
  clientId: z.string().trim().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  redirectUri: z.string().url('Invalid redirect URI'),
  tenantId: z.string().trim().min(1, 'tenantId cannot be empty').optional(),
  userEmail: z.string().email('Invalid user email').nullish(),
});

/**
 * Validate store-configuration input before any write
 * @throws OAuthError (`invalid_configuration`, 400) listing every issue
 */
export function validateConfigurationInput(input: unknown): ConfigurationInput {
  const result = ConfigurationInputSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  throw OAuthError.invalidConfiguration(issues[0]?.message ?? 'invalid input', {
    statusCode: StatusCodes.BAD_REQUEST,
    context: { issues },
  });
}
