import { expect } from 'chai';
import { loadServiceSettings } from './settings.js';
import { InternalServiceError } from '../errors/service-error.js';
import { LogLevel } from '../logging/types.js';

describe('loadServiceSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadServiceSettings({})).to.deep.equal({
      httpTimeoutMs: 10_000,
      logLevel: LogLevel.Info,
      defaultTenantId: 'common',
    });
  });

  it('reads every variable', () => {
    expect(
      loadServiceSettings({
        EMAIL_OAUTH_HTTP_TIMEOUT_MS: '2500',
        EMAIL_OAUTH_LOG_LEVEL: ' DEBUG ',
        EMAIL_OAUTH_DEFAULT_TENANT: 'organizations',
      })
    ).to.deep.equal({
      httpTimeoutMs: 2500,
      logLevel: LogLevel.Debug,
      defaultTenantId: 'organizations',
    });
  });

  it('treats blank values as unset', () => {
    expect(
      loadServiceSettings({
        EMAIL_OAUTH_HTTP_TIMEOUT_MS: '',
        EMAIL_OAUTH_LOG_LEVEL: '  ',
        EMAIL_OAUTH_DEFAULT_TENANT: '',
      })
    ).to.deep.equal({
      httpTimeoutMs: 10_000,
      logLevel: LogLevel.Info,
      defaultTenantId: 'common',
    });
  });

  it('names every invalid variable', () => {
    let caught: unknown;
    try {
      loadServiceSettings({
        EMAIL_OAUTH_HTTP_TIMEOUT_MS: '-5',
        EMAIL_OAUTH_LOG_LEVEL: 'verbose',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(InternalServiceError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).to.match(/^Invalid service settings: /);
    expect(message).to.contain(
      'EMAIL_OAUTH_HTTP_TIMEOUT_MS: EMAIL_OAUTH_HTTP_TIMEOUT_MS must be a positive integer'
    );
    expect(message).to.contain('EMAIL_OAUTH_LOG_LEVEL: ');
  });
});
