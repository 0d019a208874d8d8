/**
 * Shapes of provider response bodies and helpers to read them
 */

import { z } from 'zod';

/**
 * Raw token endpoint response before normalization
 */
export const RawTokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    expires_in: z
      .union([
        z.number().nonnegative(),
        z.string().regex(/^\d+$/).transform(Number),
      ])
      .optional(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type RawTokenResponse = z.infer<typeof RawTokenResponseSchema>;

// RFC 6749 error body: { error, error_description }
const OAuthErrorBodySchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

// Google and Graph REST error body: { error: { code, message, status } }
const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.union([z.string(), z.number()]).optional(),
    status: z.string().optional(),
    message: z.string().optional(),
  }),
});

export type ProviderErrorDetails = {
  error?: string;
  description?: string;
};

/**
 * Extract the provider's error code and description from an error body
 */
export function readProviderError(data: unknown): ProviderErrorDetails {
  const oauthBody = OAuthErrorBodySchema.safeParse(data);
  if (oauthBody.success) {
    return {
      error: oauthBody.data.error,
      ...(oauthBody.data.error_description
        ? { description: oauthBody.data.error_description }
        : {}),
    };
  }

  const apiBody = ApiErrorBodySchema.safeParse(data);
  if (apiBody.success) {
    const { code, status, message } = apiBody.data.error;
    const error = typeof code === 'string' ? code : status;
    return {
      ...(error ? { error } : {}),
      ...(message ? { description: message } : {}),
    };
  }

  if (typeof data === 'string' && data.trim()) {
    return { description: data.trim() };
  }

  return {};
}

/**
 * Normalize a scope string from a provider response.
 * Handles both space-delimited and comma-delimited scopes and falls back to
 * the requested scopes when the provider returns none.
 */
export function normalizeScope(
  providerScope: string | undefined,
  requestedScopes: readonly string[]
): string {
  if (providerScope && providerScope.trim()) {
    const scopes = providerScope
      .split(/[,\s]+/)
      .map((scope) => scope.trim())
      .filter((scope) => scope.length > 0);

    if (scopes.length > 0) {
      return scopes.join(' ');
    }
  }

  return requestedScopes.join(' ');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
