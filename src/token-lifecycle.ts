/**
 * Token expiry policy and the mapping from provider token responses to the
 * persisted configuration shape. Shared by every adapter.
 */

import type { TokenData, VendorEmailConfiguration } from './types.js';
import type { ConfigurationPatch } from './storage/configuration-store.js';

/**
 * Tokens expiring within this window are refreshed before use, so a token
 * valid at check time cannot expire mid-request at the provider.
 */
export const TOKEN_EXPIRY_LOOKAHEAD_MS = 5 * 60 * 1000;

/** Lifetime assumed when a provider omits `expires_in` */
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;

type ExpiringToken = Pick<VendorEmailConfiguration, 'expiresAt'>;

export function computeExpiresAt(expiresIn: number, now = Date.now()): Date {
  return new Date(now + expiresIn * 1000);
}

/**
 * True iff now > expiresAt. Tokens without a known expiry never count as expired.
 */
export function isTokenExpired(config: ExpiringToken, now = Date.now()): boolean {
  return config.expiresAt !== null && now > config.expiresAt.getTime();
}

/**
 * True iff now + lookahead > expiresAt
 */
export function isTokenExpiringSoon(
  config: ExpiringToken,
  now = Date.now()
): boolean {
  return (
    config.expiresAt !== null &&
    now + TOKEN_EXPIRY_LOOKAHEAD_MS > config.expiresAt.getTime()
  );
}

export function needsRefresh(config: ExpiringToken, now = Date.now()): boolean {
  return isTokenExpired(config, now) || isTokenExpiringSoon(config, now);
}

/**
 * Whole seconds left before expiry; 0 once expired, null when unknown
 */
export function secondsUntilExpiration(
  config: ExpiringToken,
  now = Date.now()
): number | null {
  if (config.expiresAt === null) {
    return null;
  }
  return Math.max(0, Math.floor((config.expiresAt.getTime() - now) / 1000));
}

/**
 * Fields written after a refresh. A response that omits `refresh_token`
 * keeps the stored one; a refresh never clears it.
 */
export function refreshedTokenPatch(
  current: Pick<VendorEmailConfiguration, 'refreshToken'>,
  token: { accessToken: string; refreshToken?: string; expiresIn: number },
  now = Date.now()
): ConfigurationPatch {
  return {
    accessToken: token.accessToken,
    refreshToken: token.refreshToken || current.refreshToken,
    expiresIn: token.expiresIn,
    expiresAt: computeExpiresAt(token.expiresIn, now),
  };
}

/**
 * Fields written after a successful callback, including the mailbox address
 * read from the provider profile (the previous address is kept when absent).
 */
export function storedTokenPatch(
  current: Pick<VendorEmailConfiguration, 'refreshToken' | 'userEmail'>,
  tokenData: TokenData,
  userEmail: string | null,
  now = Date.now()
): ConfigurationPatch {
  return {
    ...refreshedTokenPatch(current, tokenData, now),
    userEmail: userEmail ?? current.userEmail,
  };
}

/**
 * Fields written when tokens are revoked; the row itself stays
 */
export function clearedTokenPatch(): ConfigurationPatch {
  return {
    accessToken: null,
    refreshToken: null,
    expiresAt: null,
    expiresIn: 0,
  };
}
