/**
 * Microsoft adapter: Microsoft identity platform v2.0 endpoints and Graph
 */

import * as openidClient from 'openid-client';
import {
  BaseEmailOAuthAdapter,
  type AdapterDependencies,
  type SendRequest,
} from '../../base-adapter.js';
import {
  PROVIDER_MICROSOFT,
  type ConfigurationInput,
  type EmailData,
  type ProviderQuirks,
  type UserInfo,
  type VendorEmailConfiguration,
} from '../../types.js';
import { PROVIDER_DISPLAY_NAMES } from '../../storage/serialization.js';
import { clearedTokenPatch } from '../../token-lifecycle.js';
import { decodeAuthState, encodeAuthState } from '../../auth-state.js';
import { ErrorNormalizer } from '../../utils/error-normalizer.js';
import {
  DEFAULT_MICROSOFT_TENANT,
  MICROSOFT_SCOPES,
  MICROSOFT_SEND_URL,
  MICROSOFT_USERINFO_URL,
  microsoftOAuthEndpoint,
} from './constants.js';
import { buildGraphPayload } from './message.js';
const { randomState } = openidClient;

export class MicrosoftEmailAdapter extends BaseEmailOAuthAdapter {
  public readonly provider = PROVIDER_MICROSOFT;
  public readonly displayName = PROVIDER_DISPLAY_NAMES.microsoft;
  protected readonly scopes = MICROSOFT_SCOPES;

  private readonly defaultTenantId: string;

  public constructor(deps: AdapterDependencies) {
    super(deps);
    this.defaultTenantId = deps.defaultTenantId ?? DEFAULT_MICROSOFT_TENANT;
  }

  private tenantOf(config: VendorEmailConfiguration): string {
    return config.tenantId || this.defaultTenantId;
  }

  protected getAuthorizationEndpoint(config: VendorEmailConfiguration): string {
    return microsoftOAuthEndpoint(this.tenantOf(config), 'authorize');
  }

  protected getTokenEndpoint(config: VendorEmailConfiguration): string {
    return microsoftOAuthEndpoint(this.tenantOf(config), 'token');
  }

  protected getUserInfoEndpoint(): string {
    return MICROSOFT_USERINFO_URL;
  }

  protected buildProviderAuthParams(
    config: VendorEmailConfiguration
  ): Record<string, string> {
    return {
      response_mode: 'query',
      prompt: 'consent',
      access_type: 'offline',
      state: encodeAuthState(config.id, { csrf: randomState() }),
    };
  }

  /**
   * The token endpoint expects the scopes again on every grant
   */
  protected buildTokenRequestExtras(): Record<string, string> {
    return { scope: this.scopes.join(' ') };
  }

  protected decodeState(state: string): string | null {
    return decodeAuthState(state)?.uid ?? null;
  }

  protected resolveTenantId(input: ConfigurationInput): string {
    return input.tenantId ?? this.defaultTenantId;
  }

  /**
   * `mail` is null for accounts without an Exchange mailbox
   */
  protected extractUserEmail(userInfo: UserInfo): string | null {
    for (const field of ['mail', 'userPrincipalName']) {
      const value = userInfo[field];
      if (typeof value === 'string' && value) {
        return value;
      }
    }
    return null;
  }

  protected buildSendRequest(emailData: EmailData): SendRequest {
    return { url: MICROSOFT_SEND_URL, json: buildGraphPayload(emailData) };
  }

  protected computeProviderQuirks(): ProviderQuirks {
    return {
      reissuesRefreshToken: true,
      supportsRevocation: false,
      requiresTenant: true,
      messageFormat: 'graph-json',
    };
  }

  /**
   * Graph has no revocation endpoint for delegated tokens: the tokens are
   * forgotten locally and stay valid at Microsoft until they expire.
   */
  public async revokeToken(config: VendorEmailConfiguration): Promise<boolean> {
    const stage = 'revokeToken';
    try {
      await this.store.update(config.id, clearedTokenPatch());
    } catch (error) {
      this.logger.error('Error clearing tokens', {
        stage,
        configId: config.id,
        error: ErrorNormalizer.describe(error),
      });
      return false;
    }

    this.logger.info('Tokens cleared locally', {
      stage,
      configId: config.id,
      hadAccessToken: Boolean(config.accessToken),
    });
    return true;
  }
}
