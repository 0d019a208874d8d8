/**
 * Google adapter: Google OAuth 2.0 endpoints and the Gmail API
 */

import { BaseEmailOAuthAdapter, type SendRequest } from '../../base-adapter.js';
import {
  PROVIDER_GOOGLE,
  type EmailData,
  type ProviderQuirks,
  type UserInfo,
  type VendorEmailConfiguration,
} from '../../types.js';
import { PROVIDER_DISPLAY_NAMES } from '../../storage/serialization.js';
import { clearedTokenPatch } from '../../token-lifecycle.js';
import { decodeAuthState, encodeAuthState } from '../../auth-state.js';
import { ErrorNormalizer } from '../../utils/error-normalizer.js';
import type { HttpResponse } from '../../utils/http-client.js';
import { OAuthErrorCode } from '../../errors/oauth-error.js';
import { readProviderError } from '../../utils/provider-responses.js';
import {
  GOOGLE_AUTHORIZATION_URL,
  GOOGLE_REVOKE_URL,
  GOOGLE_SCOPES,
  GOOGLE_SEND_URL,
  GOOGLE_TOKEN_URL,
  GOOGLE_USERINFO_URL,
} from './constants.js';
import { buildGmailPayload } from './message.js';

export class GoogleEmailAdapter extends BaseEmailOAuthAdapter {
  public readonly provider = PROVIDER_GOOGLE;
  public readonly displayName = PROVIDER_DISPLAY_NAMES.google;
  protected readonly scopes = GOOGLE_SCOPES;

  protected getAuthorizationEndpoint(): string {
    return GOOGLE_AUTHORIZATION_URL;
  }

  protected getTokenEndpoint(): string {
    return GOOGLE_TOKEN_URL;
  }

  protected getUserInfoEndpoint(): string {
    return GOOGLE_USERINFO_URL;
  }

  /**
   * `prompt=consent` makes Google issue a refresh token on every consent
   */
  protected buildProviderAuthParams(
    config: VendorEmailConfiguration
  ): Record<string, string> {
    return {
      access_type: 'offline',
      prompt: 'consent',
      state: encodeAuthState(config.id),
    };
  }

  protected decodeState(state: string): string | null {
    return decodeAuthState(state)?.uid ?? null;
  }

  protected extractUserEmail(userInfo: UserInfo): string | null {
    return typeof userInfo.email === 'string' && userInfo.email
      ? userInfo.email
      : null;
  }

  protected async buildSendRequest(emailData: EmailData): Promise<SendRequest> {
    return { url: GOOGLE_SEND_URL, json: await buildGmailPayload(emailData) };
  }

  protected computeProviderQuirks(): ProviderQuirks {
    return {
      reissuesRefreshToken: false,
      supportsRevocation: true,
      requiresTenant: false,
      messageFormat: 'rfc2822',
    };
  }

  /**
   * Revoke the access token at Google, then forget every token locally.
   * A token Google no longer knows counts as revoked. Refusals and network
   * failures are logged and reported as false; a failed local write throws.
   */
  public async revokeToken(config: VendorEmailConfiguration): Promise<boolean> {
    const stage = 'revokeToken';
    if (!config.accessToken) {
      this.logger.warn('No access token to revoke', { stage, configId: config.id });
      return false;
    }

    let response: HttpResponse;
    try {
      response = await this.http({
        method: 'POST',
        url: GOOGLE_REVOKE_URL,
        form: { token: config.accessToken },
      });
    } catch (error) {
      this.logger.error('Error revoking token', {
        stage,
        configId: config.id,
        error: ErrorNormalizer.describe(error),
      });
      return false;
    }

    if (!response.ok) {
      const { error, description } = readProviderError(response.data);
      if (error !== OAuthErrorCode.InvalidToken) {
        this.logger.warn('Token revocation rejected', {
          stage,
          configId: config.id,
          status: response.status,
          error,
          description,
        });
        return false;
      }
      this.logger.info('Token already revoked at Google', { stage, configId: config.id });
    }

    await this.persist(config.id, clearedTokenPatch(), stage);
    this.logger.info('Token revoked', { stage, configId: config.id });
    return true;
  }
}
