import type { ProviderName, VendorEmailConfiguration } from '../types.js';

export const PROVIDER_DISPLAY_NAMES: Record<ProviderName, string> = {
  google: 'Google API',
  microsoft: 'Microsoft Graph',
};

/**
 * Outward shape of a configuration. Credentials and tokens are reduced to
 * presence flags.
 */
export type PublicConfiguration = Omit<
  VendorEmailConfiguration,
  'clientSecret' | 'accessToken' | 'refreshToken'
> & {
  providerDisplayName: string;
  hasAccessToken: boolean;
  hasRefreshToken: boolean;
};

export function toPublicConfiguration(
  config: VendorEmailConfiguration
): PublicConfiguration {
  const {
    clientSecret: _clientSecret,
    accessToken,
    refreshToken,
    ...visible
  } = config;

  return {
    ...visible,
    providerDisplayName: PROVIDER_DISPLAY_NAMES[config.provider],
    hasAccessToken: Boolean(accessToken),
    hasRefreshToken: Boolean(refreshToken),
  };
}
