/**
 * Process bootstrap: builds the store, logger, registry and service once
 */

import { EmailOAuthService } from '../service/email-oauth-service.js';
import {
  createDefaultRegistry,
  type ProviderRegistry,
} from '../registry/provider-registry.js';
import type { ConfigurationStore } from '../storage/configuration-store.js';
import { InMemoryConfigurationStore } from '../storage/in-memory-store.js';
import { InternalServiceError } from '../errors/service-error.js';
import { createServiceLogger } from '../logging/service-logger.js';
import type { LogTransport, Logger } from '../logging/types.js';
import { loadServiceSettings, type ServiceSettings } from './settings.js';

export interface CreateServiceOptions {
  /** Persistent store; required when NODE_ENV is production */
  store?: ConfigurationStore;
  logger?: Logger;
  /** Transport of the default logger */
  transport?: LogTransport;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Overrides the settings read from `env` */
  settings?: Partial<ServiceSettings>;
}

export type EmailOAuthRuntime = {
  service: EmailOAuthService;
  registry: ProviderRegistry;
  store: ConfigurationStore;
  logger: Logger;
  settings: ServiceSettings;
};

/**
 * Enforce production storage safety by preventing unsafe fallbacks to
 * in-memory storage
 *
 * @throws InternalServiceError if no store is provided in production
 */
export function enforceProductionStorage(
  store: ConfigurationStore | undefined,
  env: Record<string, string | undefined>,
  logger: Logger
): ConfigurationStore {
  if (store) {
    return store;
  }
  if (env.NODE_ENV === 'production') {
    throw new InternalServiceError(
      'A persistent configuration store is required in production; in-memory storage is not allowed'
    );
  }
  logger.warn(
    'No configuration store provided; using in-memory storage (not for production)',
    { stage: 'initialize' }
  );
  return new InMemoryConfigurationStore();
}

/**
 * Wire the service from environment variables
 *
 * @example
 * ```typescript
 * const { service } = createEmailOAuthService({ store: databaseStore });
 * const { authUrl } = await service.getAuthUrl(configId);
 * ```
 */
export function createEmailOAuthService(
  options: CreateServiceOptions = {}
): EmailOAuthRuntime {
  const env = options.env ?? process.env;
  const settings: ServiceSettings = {
    ...loadServiceSettings(env),
    ...options.settings,
  };

  const logger =
    options.logger ??
    createServiceLogger({ level: settings.logLevel, transport: options.transport });
  const store = enforceProductionStorage(options.store, env, logger);

  const registry = createDefaultRegistry({
    store,
    logger,
    httpTimeoutMs: settings.httpTimeoutMs,
    defaultTenantId: settings.defaultTenantId,
  });

  return {
    service: new EmailOAuthService(store, registry, logger),
    registry,
    store,
    logger,
    settings,
  };
}
