/**
 * Microsoft Graph `sendMail` request body
 */

import type { EmailData } from '../../types.js';
import {
  normalizeContentType,
  toAddressList,
} from '../../validation/email-validation.js';

export type GraphRecipient = {
  emailAddress: { address: string; name?: string };
};

export type GraphSendMailPayload = {
  message: {
    subject: string;
    body: { contentType: 'HTML' | 'Text'; content: string };
    toRecipients: GraphRecipient[];
    ccRecipients?: GraphRecipient[];
    bccRecipients?: GraphRecipient[];
  };
  saveToSentItems: boolean;
};

function toRecipients(addresses: string[]): GraphRecipient[] {
  return addresses.map((address) => ({ emailAddress: { address } }));
}

export function buildGraphPayload(emailData: EmailData): GraphSendMailPayload {
  const recipient: GraphRecipient = { emailAddress: { address: emailData.to } };
  if (emailData.toName && emailData.toName.trim()) {
    recipient.emailAddress.name = emailData.toName.trim();
  }

  const payload: GraphSendMailPayload = {
    message: {
      subject: emailData.subject,
      body: {
        contentType:
          normalizeContentType(emailData.contentType) === 'text' ? 'Text' : 'HTML',
        content: emailData.content,
      },
      toRecipients: [recipient],
    },
    saveToSentItems: true,
  };

  const cc = toAddressList(emailData.cc);
  if (cc.length > 0) {
    payload.message.ccRecipients = toRecipients(cc);
  }

  const bcc = toAddressList(emailData.bcc);
  if (bcc.length > 0) {
    payload.message.bccRecipients = toRecipients(bcc);
  }

  return payload;
}
