export const MICROSOFT_LOGIN_BASE_URL = 'https://login.microsoftonline.com';
export const MICROSOFT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
export const MICROSOFT_USERINFO_URL = `${MICROSOFT_GRAPH_BASE_URL}/me`;
export const MICROSOFT_SEND_URL = `${MICROSOFT_GRAPH_BASE_URL}/me/sendMail`;

/** Tenant segment used when a configuration names none */
export const DEFAULT_MICROSOFT_TENANT = 'common';

export const MICROSOFT_SCOPES = [
  'Calendars.ReadWrite',
  'IMAP.AccessAsUser.All',
  'Mail.Read',
  'Mail.ReadWrite',
  'Mail.Send',
  'openid',
  'profile',
  'SMTP.Send',
  'User.Read',
  'email',
  'offline_access',
] as const;

export function microsoftOAuthEndpoint(
  tenantId: string,
  endpoint: 'authorize' | 'token'
): string {
  return `${MICROSOFT_LOGIN_BASE_URL}/${encodeURIComponent(tenantId)}/oauth2/v2.0/${endpoint}`;
}
