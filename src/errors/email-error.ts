import { StatusCodes } from 'http-status-codes';
import { coerceErrorStatus } from './status.js';

/**
 * Machine-readable sub-codes for message construction, validation and transmission
 */
export const EmailErrorCode = {
  InvalidRecipient: 'invalid_recipient',
  EmptySubject: 'empty_subject',
  EmptyContent: 'empty_content',
  InvalidEmailFormat: 'invalid_email_format',
  InvalidAttachment: 'invalid_attachment',
  SizeLimitExceeded: 'size_limit_exceeded',
  SendLimitExceeded: 'send_limit_exceeded',
  ProviderUnavailable: 'provider_unavailable',
  QuotaExceeded: 'quota_exceeded',
  SendTimeout: 'send_timeout',
  NetworkError: 'network_error',
} as const;

export type EmailErrorCode = (typeof EmailErrorCode)[keyof typeof EmailErrorCode];

export interface EmailErrorOptions {
  statusCode?: number;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class EmailError extends Error {
  public readonly statusCode: number;
  public readonly error: EmailErrorCode;
  public readonly context: Record<string, unknown>;

  public constructor(
    message: string,
    error: EmailErrorCode,
    options: EmailErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'EmailError';
    this.error = error;
    this.statusCode = coerceErrorStatus(
      options.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR
    );
    this.context = options.context ?? {};
  }

  public static invalidRecipient(email: string, provider = 'Unknown'): EmailError {
    return new EmailError(
      `Invalid email recipient: ${email}`,
      EmailErrorCode.InvalidRecipient,
      {
        statusCode: StatusCodes.BAD_REQUEST,
        context: { field: 'to', to: email, provider },
      }
    );
  }

  public static emptySubject(provider = 'Unknown'): EmailError {
    return new EmailError(
      'Email subject cannot be empty',
      EmailErrorCode.EmptySubject,
      { statusCode: StatusCodes.BAD_REQUEST, context: { field: 'subject', provider } }
    );
  }

  public static emptyContent(provider = 'Unknown'): EmailError {
    return new EmailError(
      'Email content cannot be empty',
      EmailErrorCode.EmptyContent,
      { statusCode: StatusCodes.BAD_REQUEST, context: { field: 'content', provider } }
    );
  }

  public static invalidEmailFormat(field: string, value: string): EmailError {
    return new EmailError(
      `Invalid email format in ${field}: ${value}`,
      EmailErrorCode.InvalidEmailFormat,
      { statusCode: StatusCodes.BAD_REQUEST, context: { field, value } }
    );
  }

  public static invalidAttachment(filename: string, reason = ''): EmailError {
    return new EmailError(
      `Invalid attachment: ${filename}` + (reason ? ` - ${reason}` : ''),
      EmailErrorCode.InvalidAttachment,
      { statusCode: StatusCodes.BAD_REQUEST, context: { filename, reason } }
    );
  }

  public static sizeLimitExceeded(
    size: number,
    maxSize: number,
    provider = 'Unknown'
  ): EmailError {
    return new EmailError(
      `Email size exceeded: ${size} bytes. Maximum allowed: ${maxSize} bytes`,
      EmailErrorCode.SizeLimitExceeded,
      {
        statusCode: StatusCodes.REQUEST_TOO_LONG,
        context: { size, maxSize, provider },
      }
    );
  }

  public static sendLimitExceeded(provider = 'Unknown'): EmailError {
    return new EmailError(
      'Email sending limit exceeded',
      EmailErrorCode.SendLimitExceeded,
      { statusCode: StatusCodes.TOO_MANY_REQUESTS, context: { provider } }
    );
  }

  public static providerUnavailable(provider: string): EmailError {
    return new EmailError(
      `Email service provider unavailable: ${provider}`,
      EmailErrorCode.ProviderUnavailable,
      { statusCode: StatusCodes.SERVICE_UNAVAILABLE, context: { provider } }
    );
  }

  public static quotaExceeded(
    provider: string,
    currentUsage: number,
    limit: number
  ): EmailError {
    return new EmailError(
      `Email quota exceeded for ${provider}: ${currentUsage}/${limit}`,
      EmailErrorCode.QuotaExceeded,
      {
        statusCode: StatusCodes.FORBIDDEN,
        context: { provider, currentUsage, limit },
      }
    );
  }

  public static sendTimeout(
    provider: string,
    timeoutSeconds: number,
    cause?: unknown
  ): EmailError {
    return new EmailError(
      `Email send timeout with ${provider}: ${timeoutSeconds} seconds`,
      EmailErrorCode.SendTimeout,
      {
        statusCode: StatusCodes.REQUEST_TIMEOUT,
        context: { provider, timeout: timeoutSeconds },
        cause,
      }
    );
  }

  public static networkError(
    provider: string,
    details = '',
    cause?: unknown
  ): EmailError {
    return new EmailError(
      `Network error with ${provider}` + (details ? `: ${details}` : ''),
      EmailErrorCode.NetworkError,
      {
        statusCode: StatusCodes.BAD_GATEWAY,
        context: { provider, details },
        cause,
      }
    );
  }
}
