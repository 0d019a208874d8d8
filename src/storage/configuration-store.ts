import type { ProviderName, VendorEmailConfiguration } from '../types.js';

/**
 * Fields written when a configuration is created; tokens start unset
 */
export type NewConfiguration = Pick<
  VendorEmailConfiguration,
  | 'vendorId'
  | 'locationId'
  | 'provider'
  | 'clientId'
  | 'clientSecret'
  | 'tenantId'
  | 'redirectUri'
  | 'userEmail'
>;

/**
 * Mutable fields of a configuration. The provider and credentials are
 * immutable once created.
 */
export type ConfigurationPatch = Partial<
  Pick<
    VendorEmailConfiguration,
    'userEmail' | 'accessToken' | 'refreshToken' | 'expiresIn' | 'expiresAt'
  >
>;

export type ConfigurationFilter = {
  vendorId?: number;
  locationId?: number;
  provider?: ProviderName;
};

/**
 * Persistence hook for vendor email configurations.
 * Implementations back it with a database; `update` must apply the whole
 * patch or nothing.
 */
export interface ConfigurationStore {
  /**
   * Insert a configuration and return it with its assigned identifier
   * @throws Error if the provider is not one of the supported providers
   */
  create(data: NewConfiguration): Promise<VendorEmailConfiguration>;

  /**
   * Look a configuration up by identifier; soft-deleted rows resolve to null
   */
  findById(id: string): Promise<VendorEmailConfiguration | null>;

  /**
   * Atomically apply `patch` and stamp `updatedAt`
   * @throws Error if the configuration does not exist or is soft-deleted
   */
  update(id: string, patch: ConfigurationPatch): Promise<VendorEmailConfiguration>;

  /**
   * Mark a configuration deleted; returns false when it was not found
   */
  softDelete(id: string): Promise<boolean>;

  /**
   * Active configurations matching every field of the filter
   */
  list(filter?: ConfigurationFilter): Promise<VendorEmailConfiguration[]>;
}
