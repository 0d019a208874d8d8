import { StatusCodes } from 'http-status-codes';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import type {
  ConfigurationFilter,
  ConfigurationStore,
} from '../storage/configuration-store.js';
import {
  toPublicConfiguration,
  type PublicConfiguration,
} from '../storage/serialization.js';
import type { EmailOAuthAdapter } from '../base-adapter.js';
import { decodeAuthState } from '../auth-state.js';
import { OAuthError, OAuthErrorCode } from '../errors/oauth-error.js';
import {
  ConfigurationNotFoundError,
  InternalServiceError,
} from '../errors/service-error.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import type { Logger } from '../logging/types.js';
import type {
  ConfigurationInput,
  EmailData,
  UserInfo,
  VendorEmailConfiguration,
} from '../types.js';

export type StoreConfigurationRequest = ConfigurationInput & { provider: string };

export type AuthUrlResult = {
  provider: string;
  authUrl: string;
};

export type CallbackResult = {
  provider: string;
  userEmail: string | null;
  expiresAt: string | null;
};

export type SendEmailResult = {
  sent: true;
  provider: string;
  to: string;
  subject: string;
  sentAt: string;
};

export type RefreshResult = {
  provider: string;
  expiresAt: string | null;
};

export type RevokeResult = {
  revoked: true;
  provider: string;
};

/**
 * Entry point for request handlers: one method per inbound operation, each
 * resolving the configuration and its adapter before delegating
 */
export class EmailOAuthService {
  private readonly logger: Logger;

  public constructor(
    private readonly store: ConfigurationStore,
    private readonly registry: ProviderRegistry,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'email-oauth-service' });
  }

  public async storeConfiguration(
    request: StoreConfigurationRequest
  ): Promise<PublicConfiguration> {
    return this.run('storeConfiguration', { provider: request.provider }, async () => {
      const { provider, ...input } = request;
      const adapter = this.registry.resolve(provider);
      const config = await adapter.storeConfiguration(input);
      return toPublicConfiguration(config);
    });
  }

  public async getAuthUrl(configId: string): Promise<AuthUrlResult> {
    const meta: Record<string, unknown> = { configId };
    return this.run('getAuthUrl', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);
      return {
        provider: config.provider,
        authUrl: await adapter.getAuthorizationUrl(config.id),
      };
    });
  }

  /**
   * Exchange the code and store the tokens on the configuration named by
   * `state`, which must be the one addressed by `configId`
   */
  public async handleCallback(
    configId: string,
    code: string,
    state?: string
  ): Promise<CallbackResult> {
    const meta: Record<string, unknown> = { configId };
    return this.run('handleCallback', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);

      if (code && code.trim() && state) {
        const decoded = decodeAuthState(state);
        if (decoded && decoded.uid !== config.id) {
          throw OAuthError.invalidConfiguration(
            'State does not match the configuration',
            { statusCode: StatusCodes.BAD_REQUEST, context: { configId } }
          );
        }
      }

      const tokenData = await adapter.handleAuthorizationCallback(code, state);
      const updated = await adapter.storeToken(config, tokenData);
      return {
        provider: updated.provider,
        userEmail: updated.userEmail,
        expiresAt: updated.expiresAt?.toISOString() ?? null,
      };
    });
  }

  public async sendEmail(
    configId: string,
    emailData: EmailData
  ): Promise<SendEmailResult> {
    const meta: Record<string, unknown> = { configId };
    return this.run('sendEmail', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);
      await adapter.sendEmail(config, emailData);
      return {
        sent: true,
        provider: config.provider,
        to: emailData.to,
        subject: emailData.subject,
        sentAt: new Date().toISOString(),
      };
    });
  }

  public async refreshToken(configId: string): Promise<RefreshResult> {
    const meta: Record<string, unknown> = { configId };
    return this.run('refreshToken', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);
      const refreshed = await adapter.refreshToken(config);
      return {
        provider: refreshed.provider,
        expiresAt: refreshed.expiresAt?.toISOString() ?? null,
      };
    });
  }

  public async revokeToken(configId: string): Promise<RevokeResult> {
    const meta: Record<string, unknown> = { configId };
    return this.run('revokeToken', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);
      if (!(await adapter.revokeToken(config))) {
        throw new OAuthError('Token could not be revoked', {
          error: OAuthErrorCode.Generic,
          context: { configId },
        });
      }
      return { revoked: true, provider: config.provider };
    });
  }

  public async getUserInfo(configId: string): Promise<UserInfo> {
    const meta: Record<string, unknown> = { configId };
    return this.run('getUserInfo', meta, async () => {
      const { config, adapter } = await this.resolve(configId, meta);
      const valid = await adapter.getValidToken(config);
      if (!valid.accessToken) {
        throw OAuthError.invalidToken(adapter.displayName);
      }
      return adapter.getUserInfo(valid.accessToken);
    });
  }

  public async getConfiguration(configId: string): Promise<PublicConfiguration> {
    return this.run('getConfiguration', { configId }, async () =>
      toPublicConfiguration(await this.load(configId))
    );
  }

  public async listConfigurations(
    filter: ConfigurationFilter = {}
  ): Promise<PublicConfiguration[]> {
    return this.run('listConfigurations', { ...filter }, async () => {
      const configs = await this.readStore(() => this.store.list(filter));
      return configs.map(toPublicConfiguration);
    });
  }

  /**
   * Load the configuration and its adapter; the provider is added to `meta`
   * for failure logs
   */
  private async resolve(
    configId: string,
    meta: Record<string, unknown>
  ): Promise<{ config: VendorEmailConfiguration; adapter: EmailOAuthAdapter }> {
    const config = await this.load(configId);
    meta.provider = config.provider;
    return { config, adapter: this.registry.resolveFromConfiguration(config) };
  }

  private async load(configId: string): Promise<VendorEmailConfiguration> {
    const config = await this.readStore(() => this.store.findById(configId));
    if (!config) {
      throw new ConfigurationNotFoundError(configId);
    }
    return config;
  }

  private async readStore<T>(read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw new InternalServiceError('Configuration store unavailable', error);
    }
  }

  /**
   * Run one operation, logging any failure with the operation's context
   */
  private async run<T>(
    operation: string,
    meta: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`${operation} failed`, {
        operation,
        ...meta,
        error: ErrorNormalizer.describe(error),
        ...(ErrorNormalizer.isTaxonomyError(error)
          ? { errorCode: error.error, statusCode: error.statusCode }
          : {}),
      });
      throw error;
    }
  }
}
