import { StatusCodes } from 'http-status-codes';
import { coerceErrorStatus } from './status.js';

/**
 * Caller-input and infrastructure failures that are neither OAuth nor email
 * specific. Outward responses only expose the message of the subclasses
 * marked `expose`.
 */
export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly error: string;
  public readonly expose: boolean;
  public readonly context: Record<string, unknown>;

  public constructor(
    message: string,
    options: {
      statusCode?: number;
      error?: string;
      expose?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ServiceError';
    this.statusCode = coerceErrorStatus(
      options.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR
    );
    this.error = options.error ?? 'internal_error';
    this.expose = options.expose ?? false;
    this.context = options.context ?? {};
  }
}

export class InvalidProviderError extends ServiceError {
  public constructor(provider: string, details?: string) {
    super(details ?? `Invalid OAuth2.0 provider: ${provider}`, {
      statusCode: StatusCodes.BAD_REQUEST,
      error: 'invalid_provider',
      expose: true,
      context: { provider },
    });
    this.name = 'InvalidProviderError';
  }
}

export class ConfigurationNotFoundError extends ServiceError {
  public constructor(configId: string) {
    super(`Configuration not found: ${configId}`, {
      statusCode: StatusCodes.NOT_FOUND,
      error: 'configuration_not_found',
      expose: true,
      context: { configId },
    });
    this.name = 'ConfigurationNotFoundError';
  }
}

export class InternalServiceError extends ServiceError {
  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InternalServiceError';
  }
}
