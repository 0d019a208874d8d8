/**
 * Common test utilities and helpers
 * Reduces duplication across test files
 */

import { expect } from 'chai';
import sinon from 'sinon';
import { OAuthError } from '../errors/oauth-error.js';
import { EmailError } from '../errors/email-error.js';
import { LogLevel, type Logger } from '../logging/types.js';
import { createServiceLogger } from '../logging/service-logger.js';
import { InMemoryConfigurationStore } from '../storage/in-memory-store.js';
import type { ConfigurationPatch } from '../storage/configuration-store.js';
import type {
  ConfigurationInput,
  ProviderName,
  VendorEmailConfiguration,
} from '../types.js';
import { MockTransport } from './logTransports.js';

export type FetchStub = sinon.SinonStub<
  Parameters<typeof fetch>,
  ReturnType<typeof fetch>
>;

/**
 * Replace the global fetch; its call count is the number of network calls
 */
export function stubFetch(): FetchStub {
  return sinon.stub(globalThis, 'fetch');
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function emptyResponse(status = 202): Response {
  return new Response(null, { status });
}

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Headers;
  body: string;
};

/**
 * The nth request made through the stub
 */
export function requestAt(stub: FetchStub, index: number): RecordedRequest {
  const [input, init] = stub.getCall(index).args;
  return {
    url: String(input),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? init.body : '',
  };
}

export function formOf(request: RecordedRequest): URLSearchParams {
  return new URLSearchParams(request.body);
}

export function jsonOf(request: RecordedRequest): unknown {
  return JSON.parse(request.body);
}

/**
 * Header lines of an RFC 5322 message, folded lines joined back
 */
export function headerLinesOf(message: string): string[] {
  const [headers = ''] = message.split('\r\n\r\n');
  return headers.replace(/\r\n(?=[ \t])/g, '').split('\r\n');
}

/**
 * The message carried in the `raw` field of a Gmail send request
 */
export function gmailMessageOf(request: RecordedRequest): string {
  const payload = jsonOf(request);
  expect(payload).to.be.an('object').that.has.all.keys('raw');
  const raw = typeof payload === 'object' && payload !== null && 'raw' in payload
    ? payload.raw
    : undefined;
  expect(raw).to.be.a('string');
  return Buffer.from(String(raw), 'base64url').toString('utf8');
}

/**
 * Resolve with whatever the promise rejects with
 */
export async function expectRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return expect.fail('Expected promise to reject');
}

/**
 * Helper for testing OAuth error patterns
 */
export async function expectOAuthError(
  promise: Promise<unknown>,
  expectedError: string,
  expectedStatus?: number
): Promise<OAuthError> {
  const error = await expectRejection(promise);
  if (!(error instanceof OAuthError)) {
    return expect.fail(`Expected an OAuthError, got ${String(error)}`);
  }
  expect(error.error).to.equal(expectedError);
  if (expectedStatus !== undefined) {
    expect(error.statusCode).to.equal(expectedStatus);
  }
  return error;
}

export async function expectEmailError(
  promise: Promise<unknown>,
  expectedError: string,
  expectedStatus?: number
): Promise<EmailError> {
  const error = await expectRejection(promise);
  if (!(error instanceof EmailError)) {
    return expect.fail(`Expected an EmailError, got ${String(error)}`);
  }
  expect(error.error).to.equal(expectedError);
  if (expectedStatus !== undefined) {
    expect(error.statusCode).to.equal(expectedStatus);
  }
  return error;
}

/**
 * Service logger writing into a MockTransport
 */
export function createTestLogger(level = LogLevel.Trace): {
  logger: Logger;
  transport: MockTransport;
} {
  const transport = new MockTransport();
  return { logger: createServiceLogger({ level, transport }), transport };
}

/**
 * Create a configuration in the store, optionally with tokens already set
 */
export async function seedConfiguration(
  store: InMemoryConfigurationStore,
  provider: ProviderName,
  input: ConfigurationInput,
  tokens: ConfigurationPatch = {}
): Promise<VendorEmailConfiguration> {
  const created = await store.create({
    vendorId: input.vendorId,
    locationId: input.locationId,
    provider,
    clientId: input.clientId,
    clientSecret: input.clientSecret,
    tenantId: input.tenantId ?? null,
    redirectUri: input.redirectUri,
    userEmail: input.userEmail ?? null,
  });
  if (Object.keys(tokens).length === 0) {
    return created;
  }
  return store.update(created.id, tokens);
}

/**
 * Sequential identifiers: cfg-1, cfg-2, ...
 */
export function sequentialIds(prefix = 'cfg'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
