/**
 * Error Normalizer unit tests
 * Tests failure classification and outward rendering in isolation
 */

import { expect } from 'chai';
import { ErrorNormalizer } from './error-normalizer.js';
import { OAuthError } from '../errors/oauth-error.js';
import { EmailError } from '../errors/email-error.js';
import {
  ConfigurationNotFoundError,
  InternalServiceError,
  InvalidProviderError,
} from '../errors/service-error.js';

describe('ErrorNormalizer', () => {
  describe('classifyFailure', () => {
    it('classifies aborted and timed-out requests as 504', () => {
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      });

      const classified = ErrorNormalizer.classifyFailure(timeout);

      expect(classified.statusCode).to.equal(504);
      expect(classified.error).to.equal('temporarily_unavailable');
      expect(classified.timedOut).to.be.true;
    });

    it('classifies connection failures as 503', () => {
      const classified = ErrorNormalizer.classifyFailure(new TypeError('fetch failed'));

      expect(classified).to.deep.equal({
        statusCode: 503,
        error: 'server_error',
        description: 'fetch failed',
        timedOut: false,
      });
    });

    it('classifies anything else as 500', () => {
      expect(ErrorNormalizer.classifyFailure(new Error('boom')).statusCode).to.equal(500);
      expect(ErrorNormalizer.classifyFailure('boom').description).to.equal('boom');
      expect(ErrorNormalizer.classifyFailure({ weird: true }).description).to.equal(
        'Internal Server Error'
      );
    });
  });

  describe('isTaxonomyError', () => {
    it('recognises the three error kinds only', () => {
      expect(ErrorNormalizer.isTaxonomyError(OAuthError.invalidToken('Google API'))).to.be.true;
      expect(ErrorNormalizer.isTaxonomyError(EmailError.emptySubject())).to.be.true;
      expect(ErrorNormalizer.isTaxonomyError(new InvalidProviderError('dropbox'))).to.be.true;
      expect(ErrorNormalizer.isTaxonomyError(new Error('plain'))).to.be.false;
    });
  });

  describe('toResponse', () => {
    it('renders OAuth errors with their sub-code', () => {
      const response = ErrorNormalizer.toResponse(
        OAuthError.tokenRefreshFailed(
          'Google API',
          400,
          'invalid_grant',
          'Token has been expired or revoked.'
        )
      );

      expect(response).to.deep.equal({
        statusCode: 400,
        body: {
          error: true,
          message: 'Google API token refresh failed: Token has been expired or revoked.',
          error_type: 'oauth_error',
          http_code: 400,
          oauth_error_code: 'invalid_grant',
          oauth_error_description: 'Token has been expired or revoked.',
        },
      });
    });

    it('renders email errors with the offending field only', () => {
      const response = ErrorNormalizer.toResponse(
        EmailError.invalidEmailFormat('cc', 'not-an-email')
      );

      expect(response).to.deep.equal({
        statusCode: 400,
        body: {
          error: true,
          message: 'Invalid email format in cc: not-an-email',
          error_type: 'email_error',
          http_code: 400,
          email_error_type: 'invalid_email_format',
          email_data: { field: 'cc' },
        },
      });
    });

    it('exposes caller-input service errors', () => {
      const response = ErrorNormalizer.toResponse(new ConfigurationNotFoundError('cfg-9'));

      expect(response).to.deep.equal({
        statusCode: 404,
        body: {
          error: true,
          message: 'Configuration not found: cfg-9',
          error_type: 'service_error',
          http_code: 404,
          service_error_code: 'configuration_not_found',
        },
      });
    });

    it('hides internal details behind a generic 500', () => {
      for (const error of [
        new InternalServiceError('Configuration store unavailable', new Error('ECONNREFUSED')),
        new Error('connection string postgres://user:pw@db'),
      ]) {
        expect(ErrorNormalizer.toResponse(error)).to.deep.equal({
          statusCode: 500,
          body: {
            error: true,
            message: 'Internal Server Error',
            error_type: 'service_error',
            http_code: 500,
          },
        });
      }
    });
  });
});
