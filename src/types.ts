/**
 * Identifiers of the email providers this service can broker.
 */
export const PROVIDER_GOOGLE = 'google';
export const PROVIDER_MICROSOFT = 'microsoft';

export const VALID_PROVIDERS = [PROVIDER_GOOGLE, PROVIDER_MICROSOFT] as const;

export type ProviderName = (typeof VALID_PROVIDERS)[number];

export function isProviderName(value: unknown): value is ProviderName {
  return (
    typeof value === 'string' &&
    (VALID_PROVIDERS as readonly string[]).includes(value)
  );
}

/**
 * One OAuth client binding for a vendor and location
 */
export type VendorEmailConfiguration = {
  /** Opaque identifier assigned on creation */
  id: string;
  vendorId: number;
  locationId: number;
  /** Fixed at creation; changing it would invalidate every stored credential */
  provider: ProviderName;
  clientId: string;
  /** Never serialized outward */
  clientSecret: string;
  /** Microsoft tenant segment; unused by Google */
  tenantId: string | null;
  redirectUri: string;
  /** Populated from the provider profile after the first callback */
  userEmail: string | null;
  /** Never serialized outward */
  accessToken: string | null;
  /** Never serialized outward */
  refreshToken: string | null;
  /** Token lifetime in seconds as reported by the provider */
  expiresIn: number | null;
  /** Always derived as store time + expiresIn */
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  /** Soft-delete marker; set rows are invisible to lookups */
  deletedAt: Date | null;
};

/**
 * Fields a caller supplies when registering a new configuration
 */
export type ConfigurationInput = {
  vendorId: number;
  locationId: number;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  tenantId?: string;
  userEmail?: string | null;
};

/**
 * Provider profile returned verbatim from the user-info endpoint.
 * Google exposes `email`; Microsoft exposes `mail` and `userPrincipalName`.
 */
export type UserInfo = Record<string, unknown>;

/**
 * Normalized result of an authorization-code exchange
 */
export type TokenData = {
  /** Configuration resolved from the callback state */
  configurationId: string;
  accessToken: string;
  /** Google may omit it; Microsoft re-issues it on every exchange */
  refreshToken?: string;
  /** Token lifetime in seconds */
  expiresIn: number;
  tokenType: string;
  scope: string;
  userInfo: UserInfo;
};

export type EmailContentType = 'html' | 'text';

/**
 * Message to deliver through the provider mailbox
 */
export type EmailData = {
  to: string;
  toName?: string;
  subject: string;
  content: string;
  contentType?: string;
  cc?: string | string[] | null;
  bcc?: string | string[] | null;
};

/**
 * Provider-specific capabilities and behaviours
 */
export type ProviderQuirks = {
  /** Whether a refresh response always carries a new refresh token */
  reissuesRefreshToken: boolean;
  /** Whether the provider exposes a revocation endpoint for delegated tokens */
  supportsRevocation: boolean;
  /** Whether the authorization endpoints are scoped by tenant */
  requiresTenant: boolean;
  /** Wire format of the send-mail request */
  messageFormat: 'rfc2822' | 'graph-json';
};
