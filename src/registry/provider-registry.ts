import {
  ADAPTER_METHODS,
  type AdapterDependencies,
  type EmailOAuthAdapter,
} from '../base-adapter.js';
import { GoogleEmailAdapter } from '../adapters/google/index.js';
import { MicrosoftEmailAdapter } from '../adapters/microsoft/index.js';
import { InvalidProviderError } from '../errors/service-error.js';
import { createServiceLogger } from '../logging/service-logger.js';
import type { Logger } from '../logging/types.js';
import type { VendorEmailConfiguration } from '../types.js';

/**
 * Adapter type accepted by the registry
 */
export type AdapterClass = new (deps: AdapterDependencies) => EmailOAuthAdapter;

export type RegistryStats = {
  registered: number;
  cached: number;
  providers: string[];
  cachedProviders: string[];
};

/**
 * Maps provider names to adapter types and keeps one adapter instance per
 * provider for the registry's lifetime. Construct it once at startup and
 * pass it to whatever handles requests.
 */
export class ProviderRegistry {
  private readonly adapters = new Map<string, AdapterClass>();
  private readonly cache = new Map<string, EmailOAuthAdapter>();
  private readonly logger: Logger;

  public constructor(
    private readonly deps: AdapterDependencies,
    adapters: Record<string, AdapterClass> = {}
  ) {
    this.logger = (deps.logger ?? createServiceLogger()).child({
      component: 'provider-registry',
    });
    for (const [name, adapterClass] of Object.entries(adapters)) {
      this.register(name, adapterClass);
    }
  }

  /**
   * Names are case-insensitive and surrounding whitespace is ignored
   */
  public static normalizeName(name: string): string {
    return name.trim().toLowerCase();
  }

  /**
   * Register (or replace) the adapter type for a provider name. The cached
   * instance for that name, if any, is dropped.
   *
   * @throws InvalidProviderError if the name is empty or the type does not
   * implement every adapter method
   */
  public register(name: string, adapterClass: AdapterClass): void {
    const key = ProviderRegistry.normalizeName(name);
    if (!key) {
      throw new InvalidProviderError(name, 'Provider name cannot be empty');
    }

    const prototype: unknown = adapterClass.prototype;
    const missing = ADAPTER_METHODS.filter(
      (method) =>
        typeof prototype !== 'object' ||
        prototype === null ||
        typeof Reflect.get(prototype, method) !== 'function'
    );
    if (missing.length > 0) {
      throw new InvalidProviderError(
        key,
        `Adapter for ${key} does not implement: ${missing.join(', ')}`
      );
    }

    this.adapters.set(key, adapterClass);
    this.cache.delete(key);
    this.logger.debug('Provider registered', { stage: 'register', name: key });
  }

  public has(name: string): boolean {
    return this.adapters.has(ProviderRegistry.normalizeName(name));
  }

  /**
   * @throws InvalidProviderError for unregistered names
   */
  public resolve(name: string): EmailOAuthAdapter {
    const key = ProviderRegistry.normalizeName(name);
    const adapterClass = this.adapters.get(key);
    if (!adapterClass) {
      this.logger.warn('Unknown provider requested', {
        stage: 'resolve',
        name,
      });
      throw new InvalidProviderError(name);
    }

    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const adapter = new adapterClass(this.deps);
    this.cache.set(key, adapter);
    return adapter;
  }

  /**
   * Resolve the adapter owning a stored configuration
   *
   * @throws InvalidProviderError if the configuration names no provider
   */
  public resolveFromConfiguration(
    config: Pick<VendorEmailConfiguration, 'id'> & { provider?: string | null }
  ): EmailOAuthAdapter {
    if (!config.provider || !config.provider.trim()) {
      throw new InvalidProviderError(
        '',
        `Configuration ${config.id} has no provider`
      );
    }
    return this.resolve(config.provider);
  }

  /**
   * Every registered adapter, instantiating the ones not cached yet
   */
  public resolveAll(): Map<string, EmailOAuthAdapter> {
    const resolved = new Map<string, EmailOAuthAdapter>();
    for (const name of this.adapters.keys()) {
      resolved.set(name, this.resolve(name));
    }
    return resolved;
  }

  public getAvailableProviders(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * Drop one cached instance, or all of them
   */
  public clearCache(name?: string): void {
    if (name === undefined) {
      this.cache.clear();
      return;
    }
    this.cache.delete(ProviderRegistry.normalizeName(name));
  }

  public getStats(): RegistryStats {
    return {
      registered: this.adapters.size,
      cached: this.cache.size,
      providers: this.getAvailableProviders(),
      cachedProviders: [...this.cache.keys()],
    };
  }
}

/**
 * Registry with the Google and Microsoft adapters
 */
export function createDefaultRegistry(deps: AdapterDependencies): ProviderRegistry {
  return new ProviderRegistry(deps, {
    google: GoogleEmailAdapter,
    microsoft: MicrosoftEmailAdapter,
  });
}
