import { StatusCodes } from 'http-status-codes';

/**
 * http-errors deprecates non-4xx/5xx status codes; errors carrying any other
 * code are reported as 500.
 */
export function coerceErrorStatus(statusCode: number | undefined): number {
  if (
    statusCode !== undefined &&
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode < 600
  ) {
    return statusCode;
  }
  return StatusCodes.INTERNAL_SERVER_ERROR;
}
