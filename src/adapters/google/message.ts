/**
 * RFC 5322 message assembly for the Gmail send endpoint
 */

import MailComposer from 'nodemailer/lib/mail-composer/index.js';
import type { EmailData } from '../../types.js';
import {
  normalizeContentType,
  toAddressList,
} from '../../validation/email-validation.js';

type ComposedMessage = ReturnType<MailComposer['compile']>;

/**
 * Gmail delivers to the Bcc addresses it finds in the raw message, so the
 * header is kept in the output.
 */
function keepBcc(message: ComposedMessage): ComposedMessage {
  const node: ComposedMessage & { keepBcc?: boolean } = message;
  node.keepBcc = true;
  return node;
}

function build(message: ComposedMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    message.build((error, buffer) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(buffer);
    });
  });
}

export async function buildMimeMessage(emailData: EmailData): Promise<string> {
  const name = emailData.toName?.trim();
  const cc = toAddressList(emailData.cc);
  const bcc = toAddressList(emailData.bcc);
  const body =
    normalizeContentType(emailData.contentType) === 'text'
      ? { text: emailData.content }
      : { html: emailData.content };

  const composer = new MailComposer({
    to: name ? { name, address: emailData.to } : emailData.to,
    ...(cc.length > 0 ? { cc } : {}),
    ...(bcc.length > 0 ? { bcc } : {}),
    subject: emailData.subject,
    ...body,
  });

  const raw = await build(keepBcc(composer.compile()));
  return raw.toString('utf8');
}

/**
 * Body of the Gmail send request: the message, base64url-encoded
 */
export async function buildGmailPayload(emailData: EmailData): Promise<{ raw: string }> {
  const message = await buildMimeMessage(emailData);
  return { raw: Buffer.from(message, 'utf8').toString('base64url') };
}
