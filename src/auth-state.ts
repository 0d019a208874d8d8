/**
 * Codec for the OAuth `state` parameter: base64 of a JSON object carrying the
 * configuration id (`uid`) and issue time in seconds (`timestamp`), plus an
 * optional anti-forgery token (`csrf`). The wire format is shared with
 * existing provider registrations; decoded values are untrusted input.
 */

import { z } from 'zod';

const AuthStateSchema = z
  .object({
    uid: z
      .union([z.string().trim().min(1), z.number().int().positive()])
      .transform(String),
    timestamp: z.number().int().nonnegative().optional(),
    csrf: z.string().min(1).optional(),
  })
  .passthrough();

export type AuthState = {
  uid: string;
  timestamp?: number;
  csrf?: string;
};

export function encodeAuthState(
  configId: string,
  options: { csrf?: string; now?: number } = {}
): string {
  const payload: Record<string, unknown> = {
    uid: configId,
    timestamp: Math.floor((options.now ?? Date.now()) / 1000),
  };
  if (options.csrf) {
    payload.csrf = options.csrf;
  }
  return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64');
}

/**
 * Decode a state value; null when it is not base64 JSON or lacks a
 * configuration identifier
 */
export function decodeAuthState(state: string): AuthState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(state, 'base64').toString('utf8'));
  } catch {
    return null;
  }

  const result = AuthStateSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }

  const { uid, timestamp, csrf } = result.data;
  return {
    uid,
    ...(timestamp !== undefined && { timestamp }),
    ...(csrf !== undefined && { csrf }),
  };
}
