/**
 * Consolidated test fixtures
 * Simple, focused test data for all test files
 */

import type {
  ConfigurationInput,
  EmailData,
  VendorEmailConfiguration,
} from '../types.js';

// ============================================================================
// COMMON TEST DATA
// ============================================================================

/** Fixed clock for expiry assertions: 2024-05-01T12:00:00.000Z */
export const NOW = Date.UTC(2024, 4, 1, 12, 0, 0);

export const configurationInputs = {
  google: {
    vendorId: 1,
    locationId: 2,
    clientId: 'cid',
    clientSecret: 'secret',
    redirectUri: 'https://x.test/cb',
  } satisfies ConfigurationInput,

  microsoft: {
    vendorId: 3,
    locationId: 4,
    clientId: 'ms-client-id',
    clientSecret: 'test-secret',
    redirectUri: 'https://x.test/ms/cb',
    tenantId: 'contoso',
  } satisfies ConfigurationInput,
};

export const tokens = {
  access: 'test-access-token',
  refresh: 'test-refresh-token',
  newAccess: 'new-access-token',
  newRefresh: 'new-refresh-token',
};

/**
 * Token fields of an authorized configuration expiring in one hour
 */
export const authorizedTokens = (
  now = NOW
): Pick<
  VendorEmailConfiguration,
  'accessToken' | 'refreshToken' | 'expiresIn' | 'expiresAt'
> => ({
  accessToken: tokens.access,
  refreshToken: tokens.refresh,
  expiresIn: 3600,
  expiresAt: new Date(now + 3600 * 1000),
});

// ============================================================================
// PROVIDER RESPONSE DATA
// ============================================================================

export const tokenResponses = {
  google: {
    access_token: tokens.newAccess,
    refresh_token: tokens.newRefresh,
    expires_in: 3599,
    token_type: 'Bearer',
    scope:
      'https://www.googleapis.com/auth/gmail.send https://www.googleapis.com/auth/userinfo.email',
  },

  withoutRefreshToken: {
    access_token: tokens.newAccess,
    expires_in: 3600,
    token_type: 'Bearer',
  },

  withoutExpiry: {
    access_token: tokens.newAccess,
    token_type: 'Bearer',
  },

  microsoft: {
    access_token: tokens.newAccess,
    refresh_token: tokens.newRefresh,
    expires_in: 4200,
    token_type: 'Bearer',
    scope: 'Mail.Send User.Read',
  },
};

export const errorBodies = {
  invalidGrant: {
    error: 'invalid_grant',
    error_description: 'Token has been expired or revoked.',
  },

  graphUnauthorized: {
    error: {
      code: 'InvalidAuthenticationToken',
      message: 'Access token has expired or is not yet valid.',
    },
  },

  gmailForbidden: {
    error: {
      code: 403,
      message: 'Request had insufficient authentication scopes.',
      status: 'PERMISSION_DENIED',
    },
  },
};

export const userProfiles = {
  google: {
    id: '1234567890',
    email: 'owner@example.com',
    verified_email: true,
    name: 'Mailbox Owner',
  },

  microsoft: {
    id: 'a1b2c3',
    displayName: 'Mailbox Owner',
    mail: 'owner@contoso.example',
    userPrincipalName: 'owner@contoso.onmicrosoft.example',
  },

  microsoftWithoutMailbox: {
    id: 'd4e5f6',
    displayName: 'Guest',
    mail: null,
    userPrincipalName: 'guest@contoso.onmicrosoft.example',
  },
};

// ============================================================================
// EMAIL DATA
// ============================================================================

export const emails = {
  valid: {
    to: 'recipient@example.com',
    subject: 'Quarterly report',
    content: '<p>Attached below.</p>',
  } satisfies EmailData,

  withCopies: {
    to: 'recipient@example.com',
    toName: 'Recipient Name',
    subject: 'Team update',
    content: 'Plain body',
    contentType: 'text',
    cc: ['cc1@example.com', 'cc2@example.com'],
    bcc: 'bcc@example.com',
  } satisfies EmailData,
};

// ============================================================================
// MODULE EXPORT DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'version',
    'BaseEmailOAuthAdapter',
    'GoogleEmailAdapter',
    'MicrosoftEmailAdapter',
    'ProviderRegistry',
    'createDefaultRegistry',
    'EmailOAuthService',
    'createEmailOAuthService',
    'InMemoryConfigurationStore',
    'OAuthError',
    'EmailError',
    'InvalidProviderError',
    'ErrorNormalizer',
    'DefaultLogger',
    'default',
  ],
};
