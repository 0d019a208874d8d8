import { expect } from 'chai';
import {
  isValidEmailAddress,
  normalizeContentType,
  toAddressList,
  validateEmailData,
} from './email-validation.js';
import { EmailError } from '../errors/email-error.js';
import { emails } from '../fixtures/test-data.js';
import type { EmailData } from '../types.js';

function validationError(emailData: EmailData): EmailError {
  try {
    validateEmailData(emailData, 'Google API');
  } catch (error) {
    if (error instanceof EmailError) {
      return error;
    }
    throw error;
  }
  return expect.fail('Expected validation to fail');
}

describe('validateEmailData', () => {
  it('accepts a complete message', () => {
    expect(() => validateEmailData(emails.valid, 'Google API')).to.not.throw();
    expect(() => validateEmailData(emails.withCopies, 'Google API')).to.not.throw();
  });

  it('requires a recipient', () => {
    const error = validationError({ ...emails.valid, to: '  ' });

    expect(error.error).to.equal('invalid_recipient');
    expect(error.context.field).to.equal('to');
  });

  it('rejects a malformed recipient with the field and value', () => {
    const error = validationError({ ...emails.valid, to: 'not-an-email' });

    expect(error.error).to.equal('invalid_email_format');
    expect(error.statusCode).to.equal(400);
    expect(error.context).to.deep.equal({ field: 'to', value: 'not-an-email' });
  });

  it('requires a subject and content', () => {
    expect(validationError({ ...emails.valid, subject: '' }).error).to.equal(
      'empty_subject'
    );
    expect(validationError({ ...emails.valid, content: '\n' }).error).to.equal(
      'empty_content'
    );
  });

  it('checks the recipient before the subject', () => {
    expect(validationError({ ...emails.valid, to: 'bad', subject: '' }).error).to.equal(
      'invalid_email_format'
    );
  });

  it('checks every cc and bcc address, single or listed', () => {
    const cc = validationError({ ...emails.valid, cc: ['ok@example.com', 'broken'] });
    expect(cc.context).to.deep.equal({ field: 'cc', value: 'broken' });

    const bcc = validationError({ ...emails.valid, bcc: 'also-broken' });
    expect(bcc.context).to.deep.equal({ field: 'bcc', value: 'also-broken' });
  });

  it('ignores empty cc and bcc', () => {
    expect(() =>
      validateEmailData({ ...emails.valid, cc: null, bcc: [] }, 'Google API')
    ).to.not.throw();
  });
});

describe('email helpers', () => {
  it('validates single addresses', () => {
    expect(isValidEmailAddress('someone@example.com')).to.be.true;
    expect(isValidEmailAddress('someone@')).to.be.false;
    expect(isValidEmailAddress(42)).to.be.false;
  });

  it('normalizes address lists', () => {
    expect(toAddressList(undefined)).to.deep.equal([]);
    expect(toAddressList('')).to.deep.equal([]);
    expect(toAddressList('a@example.com')).to.deep.equal(['a@example.com']);
    expect(toAddressList(['a@example.com', 'b@example.com'])).to.have.length(2);
  });

  it('defaults the content type to html', () => {
    expect(normalizeContentType(undefined)).to.equal('html');
    expect(normalizeContentType('HTML')).to.equal('html');
    expect(normalizeContentType('Text')).to.equal('text');
    expect(normalizeContentType('text/plain')).to.equal('text');
  });
});
