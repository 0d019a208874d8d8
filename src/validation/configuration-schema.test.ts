import { expect } from 'chai';
import { validateConfigurationInput } from './configuration-schema.js';
import { OAuthError } from '../errors/oauth-error.js';
import { configurationInputs } from '../fixtures/test-data.js';

function rejection(input: unknown): OAuthError {
  try {
    validateConfigurationInput(input);
  } catch (error) {
    if (error instanceof OAuthError) {
      return error;
    }
    throw error;
  }
  return expect.fail('Expected validation to fail');
}

describe('validateConfigurationInput', () => {
  it('returns the parsed input', () => {
    expect(validateConfigurationInput(configurationInputs.microsoft)).to.deep.equal(
      configurationInputs.microsoft
    );
  });

  it('requires positive integer vendor and location ids', () => {
    const error = rejection({ ...configurationInputs.google, vendorId: 0 });

    expect(error.error).to.equal('invalid_configuration');
    expect(error.statusCode).to.equal(400);
    expect(error.message).to.equal(
      'Invalid OAuth2.0 configuration: vendorId must be a positive integer'
    );

    expect(rejection({ ...configurationInputs.google, locationId: 2.5 }).message).to.equal(
      'Invalid OAuth2.0 configuration: locationId must be a positive integer'
    );
  });

  it('requires an absolute redirect URI', () => {
    expect(
      rejection({ ...configurationInputs.google, redirectUri: '/relative/cb' }).message
    ).to.equal('Invalid OAuth2.0 configuration: Invalid redirect URI');
  });

  it('checks the user email only when present', () => {
    expect(() =>
      validateConfigurationInput({ ...configurationInputs.google, userEmail: null })
    ).to.not.throw();
    expect(
      rejection({ ...configurationInputs.google, userEmail: 'nobody' }).message
    ).to.equal('Invalid OAuth2.0 configuration: Invalid user email');
  });

  it('rejects an empty tenant', () => {
    expect(rejection({ ...configurationInputs.microsoft, tenantId: ' ' }).message).to.equal(
      'Invalid OAuth2.0 configuration: tenantId cannot be empty'
    );
  });

  it('lists every issue in the context', () => {
    const error = rejection({ vendorId: 1, locationId: 1 });

    expect(error.context.issues).to.deep.equal([
      { path: 'clientId', message: 'Required' },
      { path: 'clientSecret', message: 'Required' },
      { path: 'redirectUri', message: 'Required' },
    ]);
  });
});
