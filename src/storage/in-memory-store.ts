import { randomUUID } from 'node:crypto';
import { isProviderName, type VendorEmailConfiguration } from '../types.js';
import type {
  ConfigurationFilter,
  ConfigurationPatch,
  ConfigurationStore,
  NewConfiguration,
} from './configuration-store.js';

/**
 * Process-local ConfigurationStore. Suitable for development and testing only.
 * Records are copied on the way in and out so callers never share state
 * with the store.
 */
export class InMemoryConfigurationStore implements ConfigurationStore {
  private readonly rows = new Map<string, VendorEmailConfiguration>();

  public constructor(private readonly generateId: () => string = randomUUID) {}

  async create(data: NewConfiguration): Promise<VendorEmailConfiguration> {
    if (!isProviderName(data.provider)) {
      throw new Error(`Invalid provider: ${String(data.provider)}`);
    }
    if ('expiresAt' in data) {
      throw new Error('expiresAt is derived from expiresIn and cannot be set');
    }

    const now = new Date();
    const row: VendorEmailConfiguration = {
      id: this.generateId(),
      vendorId: data.vendorId,
      locationId: data.locationId,
      provider: data.provider,
      clientId: data.clientId,
      clientSecret: data.clientSecret,
      tenantId: data.tenantId,
      redirectUri: data.redirectUri,
      userEmail: data.userEmail,
      accessToken: null,
      refreshToken: null,
      expiresIn: null,
      expiresAt: null,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };

    this.rows.set(row.id, row);
    return structuredClone(row);
  }

  async findById(id: string): Promise<VendorEmailConfiguration | null> {
    const row = this.rows.get(id);
    if (!row || row.deletedAt) {
      return null;
    }
    return structuredClone(row);
  }

  async update(
    id: string,
    patch: ConfigurationPatch
  ): Promise<VendorEmailConfiguration> {
    const row = this.rows.get(id);
    if (!row || row.deletedAt) {
      throw new Error(`Configuration ${id} does not exist`);
    }

    const updated: VendorEmailConfiguration = {
      ...row,
      ...structuredClone(patch),
      updatedAt: new Date(),
    };
    this.rows.set(id, updated);
    return structuredClone(updated);
  }

  async softDelete(id: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.deletedAt) {
      return false;
    }
    this.rows.set(id, { ...row, deletedAt: new Date() });
    return true;
  }

  async list(
    filter: ConfigurationFilter = {}
  ): Promise<VendorEmailConfiguration[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          !row.deletedAt &&
          (filter.vendorId === undefined || row.vendorId === filter.vendorId) &&
          (filter.locationId === undefined ||
            row.locationId === filter.locationId) &&
          (filter.provider === undefined || row.provider === filter.provider)
      )
      .map((row) => structuredClone(row));
  }
}
