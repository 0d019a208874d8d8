import { z } from 'zod';
import { EmailError } from '../errors/email-error.js';
import type { EmailContentType, EmailData } from '../types.js';

const EmailAddressSchema = z.string().email();

export function isValidEmailAddress(value: unknown): value is string {
  return EmailAddressSchema.safeParse(value).success;
}

/**
 * cc/bcc accept a single address or a list
 */
export function toAddressList(
  value: string | string[] | null | undefined
): string[] {
  if (value === null || value === undefined || value === '') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function normalizeContentType(contentType?: string): EmailContentType {
  const normalized = contentType?.trim().toLowerCase();
  return normalized === 'text' || normalized === 'text/plain' ? 'text' : 'html';
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

/**
 * Checks run before any network call, in this order: recipient presence and
 * format, subject, content, then every cc and bcc address.
 * @throws EmailError tagged with the offending field
 */
export function validateEmailData(emailData: EmailData, provider: string): void {
  if (isBlank(emailData.to)) {
    throw EmailError.invalidRecipient('', provider);
  }

  if (!isValidEmailAddress(emailData.to)) {
    throw EmailError.invalidEmailFormat('to', emailData.to);
  }

  if (isBlank(emailData.subject)) {
    throw EmailError.emptySubject(provider);
  }

  if (isBlank(emailData.content)) {
    throw EmailError.emptyContent(provider);
  }

  for (const field of ['cc', 'bcc'] as const) {
    for (const address of toAddressList(emailData[field])) {
      if (!isValidEmailAddress(address)) {
        throw EmailError.invalidEmailFormat(field, String(address));
      }
    }
  }
}
