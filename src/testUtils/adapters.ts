/**
 * Test adapters for testing the BaseEmailOAuthAdapter class
 */

import {
  BaseEmailOAuthAdapter,
  type AdapterDependencies,
  type SendRequest,
} from '../base-adapter.js';
import { decodeAuthState, encodeAuthState } from '../auth-state.js';
import { clearedTokenPatch } from '../token-lifecycle.js';
import {
  PROVIDER_GOOGLE,
  type EmailData,
  type ProviderQuirks,
  type UserInfo,
  type VendorEmailConfiguration,
} from '../types.js';

export const TEST_ENDPOINTS = {
  authorize: 'https://provider.test/oauth/authorize',
  token: 'https://provider.test/oauth/token',
  userInfo: 'https://provider.test/api/me',
  send: 'https://provider.test/api/send',
};

/**
 * Configuration options for test adapters
 */
export interface ConfigurableTestAdapterOptions {
  /** Provider quirks to return */
  quirks?: Partial<ProviderQuirks>;
  /** Extra query parameters, applied over the base ones */
  authParams?: Record<string, string>;
  /** Extra form fields sent with every token request */
  tokenExtras?: Record<string, string>;
}

/**
 * Adapter against a fictional provider; `login` in the profile is the mailbox
 */
export class ConfigurableTestAdapter extends BaseEmailOAuthAdapter {
  public readonly provider = PROVIDER_GOOGLE;
  public readonly displayName = 'Test Provider';
  protected readonly scopes = ['mail.send', 'profile'];

  /** Number of times quirks were computed */
  public quirkComputations = 0;

  constructor(
    deps: AdapterDependencies,
    private readonly options: ConfigurableTestAdapterOptions = {}
  ) {
    super(deps);
  }

  protected getAuthorizationEndpoint(): string {
    return TEST_ENDPOINTS.authorize;
  }

  protected getTokenEndpoint(): string {
    return TEST_ENDPOINTS.token;
  }

  protected getUserInfoEndpoint(): string {
    return TEST_ENDPOINTS.userInfo;
  }

  protected buildProviderAuthParams(
    config: VendorEmailConfiguration
  ): Record<string, string> {
    return { state: encodeAuthState(config.id), ...this.options.authParams };
  }

  protected buildTokenRequestExtras(): Record<string, string> {
    return this.options.tokenExtras ?? {};
  }

  protected decodeState(state: string): string | null {
    return decodeAuthState(state)?.uid ?? null;
  }

  protected extractUserEmail(userInfo: UserInfo): string | null {
    return typeof userInfo.login === 'string' ? userInfo.login : null;
  }

  protected buildSendRequest(emailData: EmailData): SendRequest {
    return {
      url: TEST_ENDPOINTS.send,
      json: { to: emailData.to, subject: emailData.subject },
    };
  }

  protected computeProviderQuirks(): ProviderQuirks {
    this.quirkComputations += 1;
    return {
      reissuesRefreshToken: false,
      supportsRevocation: false,
      requiresTenant: false,
      messageFormat: 'graph-json',
      ...this.options.quirks,
    };
  }

  public async revokeToken(config: VendorEmailConfiguration): Promise<boolean> {
    await this.store.update(config.id, clearedTokenPatch());
    return true;
  }
}
