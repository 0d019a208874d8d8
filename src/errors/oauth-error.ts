import { StatusCodes } from 'http-status-codes';
import { coerceErrorStatus } from './status.js';

/**
 * Machine-readable sub-codes for failures in the authorization and token lifecycle
 */
export const OAuthErrorCode = {
  TokenExpired: 'token_expired',
  InvalidToken: 'invalid_token',
  NoRefreshToken: 'no_refresh_token',
  InvalidAuthorizationCode: 'invalid_authorization_code',
  InvalidConfiguration: 'invalid_configuration',
  TokenExchangeFailed: 'token_exchange_failed',
  TokenRefreshFailed: 'token_refresh_failed',
  UserInfoFailed: 'user_info_failed',
  /** Failures with no dedicated sub-code (malformed state, storage failures) */
  Generic: 'oauth_error',
} as const;

export type OAuthErrorCode = (typeof OAuthErrorCode)[keyof typeof OAuthErrorCode];

export interface OAuthErrorOptions {
  statusCode?: number;
  /** Sub-code; providers may supply their own (e.g. `invalid_grant`) */
  error?: string;
  error_description?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Raised for anything in the authorization/token lifecycle.
 */
export class OAuthError extends Error {
  public readonly statusCode: number;
  public readonly error: string;
  public readonly error_description?: string;
  public readonly context: Record<string, unknown>;

  public constructor(message: string, options: OAuthErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'OAuthError';
    this.statusCode = coerceErrorStatus(
      options.statusCode ?? StatusCodes.UNAUTHORIZED
    );
    this.error = options.error ?? OAuthErrorCode.Generic;
    this.error_description = options.error_description;
    this.context = options.context ?? {};
  }

  public static tokenExpired(provider = 'Unknown'): OAuthError {
    return new OAuthError(`Access token expired for ${provider}`, {
      statusCode: StatusCodes.UNAUTHORIZED,
      error: OAuthErrorCode.TokenExpired,
      error_description: 'The access token has expired and must be refreshed',
      context: { provider },
    });
  }

  public static invalidToken(provider = 'Unknown'): OAuthError {
    return new OAuthError(`Invalid access token for ${provider}`, {
      statusCode: StatusCodes.UNAUTHORIZED,
      error: OAuthErrorCode.InvalidToken,
      error_description: 'The provided access token is not valid',
      context: { provider },
    });
  }

  public static noRefreshToken(provider = 'Unknown'): OAuthError {
    return new OAuthError(`No refresh token available for ${provider}`, {
      statusCode: StatusCodes.UNAUTHORIZED,
      error: OAuthErrorCode.NoRefreshToken,
      error_description:
        'The token cannot be renewed without a refresh token; the authorization flow must be repeated',
      context: { provider },
    });
  }

  public static invalidAuthorizationCode(): OAuthError {
    return new OAuthError('Invalid authorization code', {
      statusCode: StatusCodes.BAD_REQUEST,
      error: OAuthErrorCode.InvalidAuthorizationCode,
      error_description: 'The authorization code received is not valid',
    });
  }

  public static invalidConfiguration(
    details = '',
    options: { statusCode?: number; context?: Record<string, unknown> } = {}
  ): OAuthError {
    return new OAuthError(
      'Invalid OAuth2.0 configuration' + (details ? `: ${details}` : ''),
      {
        statusCode: options.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR,
        error: OAuthErrorCode.InvalidConfiguration,
        error_description: 'The OAuth2.0 client configuration is not valid',
        context: options.context ?? {},
      }
    );
  }

  /**
   * Provider rejected an authorization-code exchange. The provider's own
   * `error` and HTTP status win over the generic sub-code.
   */
  public static tokenExchangeFailed(
    provider: string,
    statusCode: number,
    providerError?: string,
    description?: string
  ): OAuthError {
    return new OAuthError(
      `${provider} token exchange failed: ${description ?? 'Unknown error'}`,
      {
        statusCode,
        error: providerError ?? OAuthErrorCode.TokenExchangeFailed,
        error_description: description,
        context: { provider },
      }
    );
  }

  public static tokenRefreshFailed(
    provider: string,
    statusCode: number,
    providerError?: string,
    description?: string
  ): OAuthError {
    return new OAuthError(
      `${provider} token refresh failed: ${description ?? 'Unknown error'}`,
      {
        statusCode,
        error: providerError ?? OAuthErrorCode.TokenRefreshFailed,
        error_description: description,
        context: { provider },
      }
    );
  }

  public static userInfoFailed(
    provider: string,
    statusCode: number,
    providerError?: string,
    description?: string
  ): OAuthError {
    return new OAuthError(
      `Error retrieving ${provider} user information: ${description ?? 'Unknown error'}`,
      {
        statusCode,
        error: providerError ?? OAuthErrorCode.UserInfoFailed,
        error_description: description,
        context: { provider },
      }
    );
  }
}
