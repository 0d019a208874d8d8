import createError from 'http-errors';
import { StatusCodes, ReasonPhrases } from 'http-status-codes';
import { OAuthError } from '../errors/oauth-error.js';
import { EmailError } from '../errors/email-error.js';
import { ServiceError } from '../errors/service-error.js';

/**
 * Classification of a value thrown at the network boundary
 */
export type FailureClassification = {
  statusCode: number;
  /** Short OAuth-style code describing the failure */
  error: string;
  description: string;
  timedOut: boolean;
};

/**
 * Outward error body; never carries secrets or stack traces
 */
export type ErrorResponseBody = {
  error: true;
  message: string;
  error_type: 'oauth_error' | 'email_error' | 'service_error';
  http_code: number;
  oauth_error_code?: string;
  oauth_error_description?: string;
  email_error_type?: string;
  email_data?: Record<string, unknown>;
  service_error_code?: string;
};

export type ErrorResponse = {
  statusCode: number;
  body: ErrorResponseBody;
};

const SAFE_EMAIL_FIELDS = ['to', 'subject', 'cc', 'bcc', 'field'];

/**
 * Utility class turning heterogeneous thrown values into the service's error
 * taxonomy and into outward responses.
 */
export class ErrorNormalizer {
  /**
   * Whether the value already belongs to the taxonomy and can surface as-is
   */
  static isTaxonomyError(
    e: unknown
  ): e is OAuthError | EmailError | ServiceError {
    return (
      e instanceof OAuthError ||
      e instanceof EmailError ||
      e instanceof ServiceError
    );
  }

  /**
   * Classify a thrown value (fetch rejection, abort, arbitrary error)
   */
  static classifyFailure(e: unknown): FailureClassification {
    const name = this.nameOf(e);
    const message = this.describe(e);

    if (
      name === 'TimeoutError' ||
      name === 'AbortError' ||
      /timeout|timed out/i.test(message)
    ) {
      return {
        statusCode: StatusCodes.GATEWAY_TIMEOUT,
        error: 'temporarily_unavailable',
        description: message,
        timedOut: true,
      };
    }

    if (/network|fetch failed|ECONNREFUSED|ECONNRESET|ENOTFOUND/i.test(message)) {
      return {
        statusCode: StatusCodes.SERVICE_UNAVAILABLE,
        error: 'server_error',
        description: message,
        timedOut: false,
      };
    }

    return {
      statusCode: StatusCodes.INTERNAL_SERVER_ERROR,
      error: 'server_error',
      description: message,
      timedOut: false,
    };
  }

  /**
   * Human-readable message of any thrown value, for logs
   */
  static describe(e: unknown): string {
    if (e instanceof Error) return e.message;
    if (typeof e === 'string') return e;
    if (
      typeof e === 'object' &&
      e !== null &&
      'message' in e &&
      typeof e.message === 'string'
    ) {
      return e.message;
    }
    return ReasonPhrases.INTERNAL_SERVER_ERROR;
  }

  // DOMException (abort and timeout signals) is not an Error on every runtime
  private static nameOf(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'name' in e) {
      return typeof e.name === 'string' ? e.name : undefined;
    }
    return undefined;
  }

  /**
   * Render any error into the outward response shape. Errors outside the
   * taxonomy collapse into a generic 500 whose message comes from http-errors.
   */
  static toResponse(e: unknown): ErrorResponse {
    if (e instanceof OAuthError) {
      const body: ErrorResponseBody = {
        error: true,
        message: e.message,
        error_type: 'oauth_error',
        http_code: e.statusCode,
        oauth_error_code: e.error,
      };
      if (e.error_description) {
        body.oauth_error_description = e.error_description;
      }
      return { statusCode: e.statusCode, body };
    }

    if (e instanceof EmailError) {
      const body: ErrorResponseBody = {
        error: true,
        message: e.message,
        error_type: 'email_error',
        http_code: e.statusCode,
        email_error_type: e.error,
      };
      const emailData = this.pick(e.context, SAFE_EMAIL_FIELDS);
      if (emailData) {
        body.email_data = emailData;
      }
      return { statusCode: e.statusCode, body };
    }

    const httpError =
      e instanceof ServiceError && e.expose
        ? createError(e.statusCode, e.message)
        : createError(StatusCodes.INTERNAL_SERVER_ERROR);

    const body: ErrorResponseBody = {
      error: true,
      message: httpError.message,
      error_type: 'service_error',
      http_code: httpError.statusCode,
    };
    if (e instanceof ServiceError && e.expose) {
      body.service_error_code = e.error;
    }
    return { statusCode: httpError.statusCode, body };
  }

  private static pick(
    source: Record<string, unknown>,
    keys: string[]
  ): Record<string, unknown> | undefined {
    const result: Record<string, unknown> = {};
    let hasData = false;
    for (const key of keys) {
      if (source[key] !== undefined) {
        result[key] = source[key];
        hasData = true;
      }
    }
    return hasData ? result : undefined;
  }
}
