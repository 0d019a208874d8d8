/**
 * Thin wrapper over the global fetch used for every provider call.
 * One attempt per call, bounded by a timeout; retries belong to the caller.
 */

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  /** Sent as application/json */
  json?: unknown;
  /** Sent as `Authorization: Bearer <token>` */
  bearerToken?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  /** Parsed JSON body, raw text when the body is not JSON, undefined when empty */
  data: unknown;
}

export async function sendRequest(request: HttpRequest): Promise<HttpResponse> {
  const headers: Record<string, string> = { Accept: 'application/json' };
  let body: string | undefined;

  if (request.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(request.form).toString();
  } else if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  }

  if (request.bearerToken) {
    headers.Authorization = `Bearer ${request.bearerToken}`;
  }

  const response = await fetch(request.url, {
    method: request.method,
    headers,
    body,
    signal: AbortSignal.timeout(request.timeoutMs),
  });

  return {
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    data: parseBody(await response.text()),
  };
}

function parseBody(text: string): unknown {
  if (!text.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
