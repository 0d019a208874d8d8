import { expect } from 'chai';
import { OAuthError, OAuthErrorCode } from './oauth-error.js';
import { EmailError, EmailErrorCode } from './email-error.js';
import {
  ConfigurationNotFoundError,
  InternalServiceError,
  InvalidProviderError,
  ServiceError,
} from './service-error.js';
import { coerceErrorStatus } from './status.js';

describe('OAuthError', () => {
  it('defaults to 401 with the generic sub-code', () => {
    const error = new OAuthError('Token could not be revoked');

    expect(error).to.be.instanceOf(Error);
    expect(error.name).to.equal('OAuthError');
    expect(error.statusCode).to.equal(401);
    expect(error.error).to.equal(OAuthErrorCode.Generic);
    expect(error.context).to.deep.equal({});
  });

  it('keeps the wrapped cause', () => {
    const cause = new Error('disk full');
    const error = new OAuthError('Error storing token', { cause, statusCode: 500 });

    expect(error.cause).to.equal(cause);
    expect(error.statusCode).to.equal(500);
  });

  it('builds every lifecycle sub-code', () => {
    expect(OAuthError.tokenExpired('Google API').error).to.equal('token_expired');
    expect(OAuthError.invalidToken('Google API').error).to.equal('invalid_token');
    expect(OAuthError.noRefreshToken('Microsoft Graph').error).to.equal(
      'no_refresh_token'
    );

    const code = OAuthError.invalidAuthorizationCode();
    expect(code.error).to.equal('invalid_authorization_code');
    expect(code.statusCode).to.equal(400);

    const config = OAuthError.invalidConfiguration('missing tenant');
    expect(config.error).to.equal('invalid_configuration');
    expect(config.statusCode).to.equal(500);
    expect(config.message).to.equal('Invalid OAuth2.0 configuration: missing tenant');
  });

  it('lets the provider error and status win on exchange failures', () => {
    const error = OAuthError.tokenExchangeFailed(
      'Google API',
      400,
      'invalid_grant',
      'Bad Request'
    );

    expect(error.statusCode).to.equal(400);
    expect(error.error).to.equal('invalid_grant');
    expect(error.error_description).to.equal('Bad Request');
    expect(error.message).to.equal('Google API token exchange failed: Bad Request');
  });

  it('falls back to its own sub-code when the provider sends none', () => {
    expect(OAuthError.tokenExchangeFailed('Google API', 502).error).to.equal(
      'token_exchange_failed'
    );
    expect(OAuthError.tokenRefreshFailed('Google API', 500).error).to.equal(
      'token_refresh_failed'
    );
    expect(OAuthError.userInfoFailed('Microsoft Graph', 401).error).to.equal(
      'user_info_failed'
    );
  });
});

describe('EmailError', () => {
  it('tags validation failures with the field', () => {
    const error = EmailError.invalidEmailFormat('bcc', 'nope');

    expect(error.error).to.equal(EmailErrorCode.InvalidEmailFormat);
    expect(error.statusCode).to.equal(400);
    expect(error.context).to.deep.equal({ field: 'bcc', value: 'nope' });
  });

  it('maps transport failures to their statuses', () => {
    expect(EmailError.networkError('Google API', 'quota').statusCode).to.equal(502);
    expect(EmailError.sendTimeout('Google API', 10).statusCode).to.equal(408);
    expect(EmailError.sizeLimitExceeded(30, 25).statusCode).to.equal(413);
    expect(EmailError.sendLimitExceeded().statusCode).to.equal(429);
    expect(EmailError.providerUnavailable('Google API').statusCode).to.equal(503);
    expect(EmailError.quotaExceeded('Google API', 10, 10).statusCode).to.equal(403);
    expect(EmailError.invalidAttachment('a.exe', 'blocked').message).to.equal(
      'Invalid attachment: a.exe - blocked'
    );
  });

  it('formats network errors with the provider message', () => {
    expect(EmailError.networkError('Microsoft Graph', 'Mailbox not enabled').message).to.equal(
      'Network error with Microsoft Graph: Mailbox not enabled'
    );
  });
});

describe('ServiceError', () => {
  it('exposes caller-input errors only', () => {
    const invalid = new InvalidProviderError('dropbox');
    expect(invalid).to.be.instanceOf(ServiceError);
    expect(invalid.statusCode).to.equal(400);
    expect(invalid.error).to.equal('invalid_provider');
    expect(invalid.expose).to.be.true;
    expect(invalid.message).to.equal('Invalid OAuth2.0 provider: dropbox');

    const missing = new ConfigurationNotFoundError('cfg-1');
    expect(missing.statusCode).to.equal(404);
    expect(missing.expose).to.be.true;

    const internal = new InternalServiceError('store down');
    expect(internal.statusCode).to.equal(500);
    expect(internal.expose).to.be.false;
  });
});

describe('coerceErrorStatus', () => {
  it('keeps 4xx and 5xx codes and turns anything else into 500', () => {
    expect(coerceErrorStatus(404)).to.equal(404);
    expect(coerceErrorStatus(503)).to.equal(503);
    expect(coerceErrorStatus(200)).to.equal(500);
    expect(coerceErrorStatus(302)).to.equal(500);
    expect(coerceErrorStatus(1.5)).to.equal(500);
  });
});
