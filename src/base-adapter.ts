import { StatusCodes } from 'http-status-codes';
import type {
  ConfigurationInput,
  EmailData,
  ProviderName,
  ProviderQuirks,
  TokenData,
  UserInfo,
  VendorEmailConfiguration,
} from './types.js';
import type {
  ConfigurationPatch,
  ConfigurationStore,
} from './storage/configuration-store.js';
import { OAuthError, OAuthErrorCode } from './errors/oauth-error.js';
import { EmailError } from './errors/email-error.js';
import { ConfigurationNotFoundError } from './errors/service-error.js';
import { ErrorNormalizer } from './utils/error-normalizer.js';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  sendRequest,
  type HttpRequest,
  type HttpResponse,
} from './utils/http-client.js';
import {
  RawTokenResponseSchema,
  isRecord,
  normalizeScope,
  readProviderError,
  type RawTokenResponse,
} from './utils/provider-responses.js';
import { SingleFlight } from './utils/single-flight.js';
import {
  DEFAULT_EXPIRES_IN_SECONDS,
  needsRefresh,
  refreshedTokenPatch,
  storedTokenPatch,
} from './token-lifecycle.js';
import { validateConfigurationInput } from './validation/configuration-schema.js';
import { validateEmailData } from './validation/email-validation.js';
import type { Logger } from './logging/types.js';
import { createServiceLogger } from './logging/service-logger.js';

/**
 * Collaborators every adapter receives from whoever constructs it
 */
export interface AdapterDependencies {
  store: ConfigurationStore;
  logger?: Logger;
  /** Upper bound for every provider call */
  httpTimeoutMs?: number;
  /** Tenant used when a Microsoft configuration names none */
  defaultTenantId?: string;
}

/**
 * Uniform contract over one provider's OAuth and mail API
 */
export interface EmailOAuthAdapter {
  readonly provider: ProviderName;
  readonly displayName: string;
  getAuthorizationUrl(configId: string): Promise<string>;
  handleAuthorizationCallback(code: string, state?: string): Promise<TokenData>;
  storeToken(
    config: VendorEmailConfiguration,
    tokenData: TokenData
  ): Promise<VendorEmailConfiguration>;
  getValidToken(config: VendorEmailConfiguration): Promise<VendorEmailConfiguration>;
  refreshToken(config: VendorEmailConfiguration): Promise<VendorEmailConfiguration>;
  sendEmail(config: VendorEmailConfiguration, emailData: EmailData): Promise<boolean>;
  getUserInfo(accessToken: string): Promise<UserInfo>;
  validateToken(accessToken: string): Promise<boolean>;
  revokeToken(config: VendorEmailConfiguration): Promise<boolean>;
  storeConfiguration(input: ConfigurationInput): Promise<VendorEmailConfiguration>;
  getAvailableScopes(): readonly string[];
  supportsScope(scope: string): boolean;
  getProviderQuirks(): ProviderQuirks;
}

/**
 * Methods a registered adapter must expose
 */
export const ADAPTER_METHODS = [
  'getAuthorizationUrl',
  'handleAuthorizationCallback',
  'storeToken',
  'getValidToken',
  'refreshToken',
  'sendEmail',
  'getUserInfo',
  'validateToken',
  'revokeToken',
  'storeConfiguration',
  'getAvailableScopes',
  'supportsScope',
  'getProviderQuirks',
] as const satisfies readonly (keyof EmailOAuthAdapter)[];

/**
 * Outbound send-mail call built by each provider
 */
export type SendRequest = {
  url: string;
  json: unknown;
};

type TokenFailureFactory = (
  provider: string,
  statusCode: number,
  providerError?: string,
  description?: string
) => OAuthError;

/**
 * Abstract base class that both provider adapters extend.
 * Owns the token lifecycle (exchange, storage, refresh, validity) and the
 * send pipeline; subclasses supply endpoints, parameters and payloads.
 */
export abstract class BaseEmailOAuthAdapter implements EmailOAuthAdapter {
  public abstract readonly provider: ProviderName;
  public abstract readonly displayName: string;

  protected readonly store: ConfigurationStore;
  protected readonly httpTimeoutMs: number;

  /**
   * Fixed scope list requested on every authorization
   */
  protected abstract readonly scopes: readonly string[];

  private readonly refreshes = new SingleFlight<VendorEmailConfiguration>();

  /**
   * Provider quirks cache for lazy memoization
   */
  private providerQuirksCache?: ProviderQuirks;

  /**
   * Logger supplied by the caller, bound to the provider on first use
   */
  private readonly baseLogger?: Logger;

  /**
   * Stores our lazily instantiated implementation of Logger.
   */
  private loggerImpl?: Logger;

  public constructor(deps: AdapterDependencies) {
    this.store = deps.store;
    this.httpTimeoutMs = deps.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.baseLogger = deps.logger;
  }

  public get logger(): Logger {
    if (this.loggerImpl === undefined) {
      const base = this.baseLogger ?? createServiceLogger();
      this.loggerImpl = base.child({ provider: this.provider });
    }
    return this.loggerImpl;
  }

  /**
   * Set a custom logger instance for this adapter
   */
  public setLogger(logger: Logger): void {
    this.loggerImpl = logger;
  }

  protected abstract getAuthorizationEndpoint(
    config: VendorEmailConfiguration
  ): string;

  protected abstract getTokenEndpoint(config: VendorEmailConfiguration): string;

  protected abstract getUserInfoEndpoint(): string;

  /**
   * Provider-specific query parameters, including `state`
   */
  protected abstract buildProviderAuthParams(
    config: VendorEmailConfiguration
  ): Record<string, string>;

  /**
   * Mailbox address found in the provider profile
   */
  protected abstract extractUserEmail(userInfo: UserInfo): string | null;

  protected abstract buildSendRequest(
    emailData: EmailData
  ): SendRequest | Promise<SendRequest>;

  protected abstract computeProviderQuirks(): ProviderQuirks;

  public abstract revokeToken(config: VendorEmailConfiguration): Promise<boolean>;

  /**
   * Extra form fields sent with every token request
   */
  protected buildTokenRequestExtras(): Record<string, string> {
    return {};
  }

  /**
   * Tenant persisted with a new configuration
   */
  protected resolveTenantId(_input: ConfigurationInput): string | null {
    return null;
  }

  public getAvailableScopes(): readonly string[] {
    return [...this.scopes];
  }

  public supportsScope(scope: string): boolean {
    return this.scopes.includes(scope);
  }

  /**
   * Return provider-specific capability flags and quirks. Lazily memoizes
   * the result of {@link computeProviderQuirks}; performs no network I/O.
   */
  public getProviderQuirks(): ProviderQuirks {
    if (!this.providerQuirksCache) {
      this.providerQuirksCache = this.computeProviderQuirks();
    }
    return this.providerQuirksCache;
  }

  /**
   * Generate the authorization URL for a stored configuration.
   *
   * @throws ConfigurationNotFoundError if the configuration is absent or deleted
   * @throws OAuthError (`invalid_configuration`) if it belongs to another provider
   */
  public async getAuthorizationUrl(configId: string): Promise<string> {
    const config = await this.loadConfiguration(configId);
    this.assertOwnConfiguration(config, 'getAuthorizationUrl');

    const url = this.buildAuthorizeUrl(this.getAuthorizationEndpoint(config), {
      ...this.buildBaseAuthParams(config),
      ...this.buildProviderAuthParams(config),
    });

    this.logger.info('Authorization URL generated', {
      stage: 'getAuthorizationUrl',
      configId,
    });
    return url;
  }

  protected buildBaseAuthParams(
    config: VendorEmailConfiguration
  ): Record<string, string> {
    return {
      client_id: config.clientId,
      redirect_uri: config.redirectUri,
      scope: this.scopes.join(' '),
      response_type: 'code',
    };
  }

  protected buildAuthorizeUrl(
    endpoint: string,
    params: Record<string, string>
  ): string {
    const url = new URL(endpoint);

    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });

    return url.toString();
  }

  /**
   * Exchange the authorization code and attach the provider profile.
   * Nothing is persisted here; a failed profile fetch fails the callback.
   */
  public async handleAuthorizationCallback(
    code: string,
    state?: string
  ): Promise<TokenData> {
    const stage = 'handleAuthorizationCallback';
    if (!code || !code.trim()) {
      throw this.fail(stage, OAuthError.invalidAuthorizationCode());
    }

    let configId: string | null = null;
    if (state) {
      const decoded = this.decodeState(state);
      if (!decoded) {
        throw this.fail(
          stage,
          new OAuthError('Invalid state received in the callback', {
            statusCode: StatusCodes.BAD_REQUEST,
            error: OAuthErrorCode.Generic,
            error_description:
              'The state parameter is not valid or does not name a configuration',
          })
        );
      }
      configId = decoded;
    }

    const config = configId ? await this.findConfiguration(configId) : null;
    if (!config) {
      throw this.fail(
        stage,
        OAuthError.invalidConfiguration(
          'Configuration not found for callback processing',
          { context: { configId } }
        )
      );
    }
    this.assertOwnConfiguration(config, stage);

    const token = await this.requestToken(
      config,
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: config.redirectUri,
      },
      stage,
      OAuthError.tokenExchangeFailed
    );

    const userInfo = await this.getUserInfo(token.access_token);

    this.logger.info('Authorization code exchanged', {
      stage,
      configId: config.id,
      hasAccessToken: true,
      hasRefreshToken: Boolean(token.refresh_token),
      tokenKeys: Object.keys(token),
    });

    return {
      configurationId: config.id,
      accessToken: token.access_token,
      ...(token.refresh_token ? { refreshToken: token.refresh_token } : {}),
      expiresIn: token.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS,
      tokenType: token.token_type ?? 'Bearer',
      scope: normalizeScope(token.scope, this.scopes),
      userInfo,
    };
  }

  /**
   * Decode the configuration identifier carried by `state`
   */
  protected abstract decodeState(state: string): string | null;

  /**
   * Persist the tokens and mailbox address in one update
   */
  public async storeToken(
    config: VendorEmailConfiguration,
    tokenData: TokenData
  ): Promise<VendorEmailConfiguration> {
    const stage = 'storeToken';
    const userEmail = this.extractUserEmail(tokenData.userInfo);
    const patch = storedTokenPatch(config, tokenData, userEmail);

    const updated = await this.persist(config.id, patch, stage, {
      tokenKeys: Object.keys(tokenData),
    });

    this.logger.info('Token stored', {
      stage,
      configId: updated.id,
      userEmail: updated.userEmail,
      expiresAt: updated.expiresAt,
      hasRefreshToken: Boolean(updated.refreshToken),
    });
    return updated;
  }

  /**
   * Return the configuration with a token valid for at least the lookahead
   * window, refreshing it first when needed
   */
  public async getValidToken(
    config: VendorEmailConfiguration
  ): Promise<VendorEmailConfiguration> {
    if (!config.accessToken) {
      throw this.fail('getValidToken', OAuthError.invalidToken(this.displayName), {
        configId: config.id,
      });
    }

    if (needsRefresh(config)) {
      this.logger.debug('Token expired or expiring soon', {
        stage: 'getValidToken',
        configId: config.id,
        expiresAt: config.expiresAt,
      });
      return this.refreshToken(config);
    }

    return config;
  }

  /**
   * Refresh the access token. Concurrent refreshes of one configuration share
   * a single provider round trip.
   */
  public async refreshToken(
    config: VendorEmailConfiguration
  ): Promise<VendorEmailConfiguration> {
    const refreshToken = config.refreshToken;
    if (!refreshToken) {
      throw this.fail(
        'refreshToken',
        OAuthError.noRefreshToken(this.displayName),
        { configId: config.id }
      );
    }

    return this.refreshes.run(config.id, () =>
      this.performRefresh(config, refreshToken)
    );
  }

  private async performRefresh(
    config: VendorEmailConfiguration,
    refreshToken: string
  ): Promise<VendorEmailConfiguration> {
    const stage = 'refreshToken';
    const token = await this.requestToken(
      config,
      { grant_type: 'refresh_token', refresh_token: refreshToken },
      stage,
      OAuthError.tokenRefreshFailed
    );

    const patch = refreshedTokenPatch(config, {
      accessToken: token.access_token,
      refreshToken: token.refresh_token,
      expiresIn: token.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS,
    });

    const updated = await this.persist(config.id, patch, stage);

    this.logger.info('Token refreshed', {
      stage,
      configId: config.id,
      expiresAt: updated.expiresAt,
      refreshTokenReissued: Boolean(token.refresh_token),
    });
    return updated;
  }

  /**
   * Validate, obtain a valid token, then make exactly one send attempt
   *
   * @returns true once the provider confirmed delivery with a 2xx
   */
  public async sendEmail(
    config: VendorEmailConfiguration,
    emailData: EmailData
  ): Promise<boolean> {
    const stage = 'sendEmail';
    try {
      validateEmailData(emailData, this.displayName);
    } catch (error) {
      throw this.fail(stage, error, { configId: config.id });
    }

    const valid = await this.getValidToken(config);
    const accessToken = valid.accessToken;
    if (!accessToken) {
      throw this.fail(stage, OAuthError.invalidToken(this.displayName), {
        configId: config.id,
      });
    }

    let request: SendRequest;
    try {
      request = await this.buildSendRequest(emailData);
    } catch (error) {
      throw this.fail(stage, error, { configId: config.id });
    }

    let response: HttpResponse;
    try {
      response = await this.http({
        method: 'POST',
        url: request.url,
        json: request.json,
        bearerToken: accessToken,
      });
    } catch (error) {
      const failure = ErrorNormalizer.classifyFailure(error);
      throw this.fail(
        stage,
        failure.timedOut
          ? EmailError.sendTimeout(
              this.displayName,
              Math.ceil(this.httpTimeoutMs / 1000),
              error
            )
          : EmailError.networkError(this.displayName, failure.description, error),
        { configId: config.id }
      );
    }

    if (!response.ok) {
      const { description } = readProviderError(response.data);
      throw this.fail(
        stage,
        EmailError.networkError(
          this.displayName,
          description ?? `Error sending email (HTTP ${response.status})`
        ),
        { configId: config.id, status: response.status }
      );
    }

    this.logger.info('Email sent', {
      stage,
      configId: config.id,
      to: emailData.to,
      subject: emailData.subject,
    });
    return true;
  }

  /**
   * Fetch the provider profile; the body is returned unmodified
   */
  public async getUserInfo(accessToken: string): Promise<UserInfo> {
    const stage = 'getUserInfo';

    let response: HttpResponse;
    try {
      response = await this.http({
        method: 'GET',
        url: this.getUserInfoEndpoint(),
        bearerToken: accessToken,
      });
    } catch (error) {
      const failure = ErrorNormalizer.classifyFailure(error);
      throw this.fail(
        stage,
        new OAuthError(
          `Error retrieving ${this.displayName} user information: ${failure.description}`,
          {
            statusCode: failure.statusCode,
            error: OAuthErrorCode.UserInfoFailed,
            cause: error,
          }
        )
      );
    }

    if (!response.ok) {
      const { error, description } = readProviderError(response.data);
      throw this.fail(
        stage,
        OAuthError.userInfoFailed(
          this.displayName,
          response.status,
          error,
          description
        )
      );
    }

    if (!isRecord(response.data)) {
      throw this.fail(
        stage,
        new OAuthError(`Malformed ${this.displayName} user information response`, {
          statusCode: StatusCodes.BAD_GATEWAY,
          error: OAuthErrorCode.UserInfoFailed,
        })
      );
    }

    return response.data;
  }

  /**
   * Liveness probe for an access token; never throws
   */
  public async validateToken(accessToken: string): Promise<boolean> {
    try {
      const response = await this.http({
        method: 'GET',
        url: this.getUserInfoEndpoint(),
        bearerToken: accessToken,
      });
      return response.ok;
    } catch (error) {
      this.logger.warn('Token validation request failed', {
        stage: 'validateToken',
        error: ErrorNormalizer.describe(error),
      });
      return false;
    }
  }

  /**
   * Validate and create a configuration owned by this provider. Tokens start
   * unset and no network call is made.
   */
  public async storeConfiguration(
    input: ConfigurationInput
  ): Promise<VendorEmailConfiguration> {
    const stage = 'storeConfiguration';
    let data: ConfigurationInput;
    try {
      data = validateConfigurationInput(input);
    } catch (error) {
      throw this.fail(stage, error);
    }

    let config: VendorEmailConfiguration;
    try {
      config = await this.store.create({
        vendorId: data.vendorId,
        locationId: data.locationId,
        provider: this.provider,
        clientId: data.clientId,
        clientSecret: data.clientSecret,
        tenantId: this.resolveTenantId(data),
        redirectUri: data.redirectUri,
        userEmail: data.userEmail ?? null,
      });
    } catch (error) {
      throw this.fail(
        stage,
        new OAuthError(
          `Error storing ${this.displayName} configuration: ${ErrorNormalizer.describe(error)}`,
          {
            statusCode: StatusCodes.INTERNAL_SERVER_ERROR,
            error: OAuthErrorCode.Generic,
            cause: error,
          }
        ),
        { vendorId: data.vendorId, locationId: data.locationId }
      );
    }

    this.logger.info('Configuration stored', {
      stage,
      configId: config.id,
      vendorId: config.vendorId,
      locationId: config.locationId,
      tenantId: config.tenantId,
    });
    return config;
  }

  /**
   * POST a grant to the token endpoint and validate the response
   */
  protected async requestToken(
    config: VendorEmailConfiguration,
    grant: Record<string, string>,
    stage: string,
    onRejected: TokenFailureFactory
  ): Promise<RawTokenResponse> {
    const failureCode =
      grant.grant_type === 'refresh_token'
        ? OAuthErrorCode.TokenRefreshFailed
        : OAuthErrorCode.TokenExchangeFailed;

    let response: HttpResponse;
    try {
      response = await this.http({
        method: 'POST',
        url: this.getTokenEndpoint(config),
        form: {
          client_id: config.clientId,
          client_secret: config.clientSecret,
          ...grant,
          ...this.buildTokenRequestExtras(),
        },
      });
    } catch (error) {
      const failure = ErrorNormalizer.classifyFailure(error);
      throw this.fail(
        stage,
        new OAuthError(
          `${this.displayName} token endpoint unreachable: ${failure.description}`,
          { statusCode: failure.statusCode, error: failureCode, cause: error }
        ),
        { configId: config.id }
      );
    }

    if (!response.ok) {
      const { error, description } = readProviderError(response.data);
      throw this.fail(
        stage,
        onRejected(this.displayName, response.status, error, description),
        { configId: config.id }
      );
    }

    const parsed = RawTokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw this.fail(
        stage,
        new OAuthError(`${this.displayName} token response is missing access_token`, {
          statusCode: StatusCodes.BAD_GATEWAY,
          error: failureCode,
        }),
        { configId: config.id }
      );
    }

    return parsed.data;
  }

  protected http(request: Omit<HttpRequest, 'timeoutMs'>): Promise<HttpResponse> {
    return sendRequest({ ...request, timeoutMs: this.httpTimeoutMs });
  }

  /**
   * Apply a token patch, wrapping storage failures as OAuth errors
   */
  protected async persist(
    configId: string,
    patch: ConfigurationPatch,
    stage: string,
    meta: Record<string, unknown> = {}
  ): Promise<VendorEmailConfiguration> {
    try {
      return await this.store.update(configId, patch);
    } catch (error) {
      throw this.fail(
        stage,
        new OAuthError(
          `Error storing ${this.displayName} token: ${ErrorNormalizer.describe(error)}`,
          {
            statusCode: StatusCodes.INTERNAL_SERVER_ERROR,
            error: OAuthErrorCode.Generic,
            context: { configId },
            cause: error,
          }
        ),
        { configId, ...meta }
      );
    }
  }

  protected async loadConfiguration(
    configId: string
  ): Promise<VendorEmailConfiguration> {
    const config = await this.findConfiguration(configId);
    if (!config) {
      throw this.fail('loadConfiguration', new ConfigurationNotFoundError(configId));
    }
    return config;
  }

  private async findConfiguration(
    configId: string
  ): Promise<VendorEmailConfiguration | null> {
    return this.store.findById(configId);
  }

  protected assertOwnConfiguration(
    config: VendorEmailConfiguration,
    stage: string
  ): void {
    if (config.provider !== this.provider) {
      throw this.fail(
        stage,
        OAuthError.invalidConfiguration(
          `Configuration is not a ${this.displayName} configuration`,
          { context: { configId: config.id, provider: config.provider } }
        )
      );
    }
  }

  /**
   * Log a failure with its context and hand it back for throwing
   */
  protected fail(
    stage: string,
    error: unknown,
    meta: Record<string, unknown> = {}
  ): unknown {
    const details = ErrorNormalizer.isTaxonomyError(error)
      ? { error: error.error, statusCode: error.statusCode, context: error.context }
      : {};
    this.logger.error(ErrorNormalizer.describe(error), {
      stage,
      ...meta,
      ...details,
    });
    return error;
  }
}
