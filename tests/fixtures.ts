import { vi } from 'vitest';
import { signRequest, type SignRequestOptions } from '../src/core/signer';
import type { AuthRequest, SecretResolver } from '../src/types';

/** Fixed clock for every test: Mon, 19 Oct 2026 12:00:00 GMT */
export const NOW = Date.UTC(2026, 9, 19, 12, 0, 0);
export const T0 = new Date(NOW);

export const ALICE_SECRET = Buffer.from('test-secret-alice');
export const BOB_SECRET = Buffer.from('test-secret-bob');

export const secrets = new Map<string, Buffer>([
  ['alice', ALICE_SECRET],
  ['bob', BOB_SECRET],
]);

export const resolveSecret: SecretResolver = (account) => secrets.get(account);

export const now = (): number => NOW;

/**
 * Build a request signed for alice (GET /data at T0 unless overridden)
 */
export function signedRequest(overrides: Partial<SignRequestOptions> = {}): AuthRequest {
  const options: SignRequestOptions = {
    account: 'alice',
    secret: ALICE_SECRET,
    method: 'GET',
    url: '/data',
    date: T0,
    ...overrides,
  };
  return {
    method: options.method,
    url: options.url,
    headers: signRequest(options),
    body: options.body,
  };
}

/**
 * Replace the signature in an Authorization header with other bytes
 */
export function withSignature(request: AuthRequest, signature: Buffer): AuthRequest {
  const authorization = String(request.headers['authorization']);
  const prefix = authorization.slice(0, authorization.indexOf(':') + 1);
  return {
    ...request,
    headers: { ...request.headers, authorization: `${prefix}${signature.toString('base64')}` },
  };
}

/**
 * Decode the signature carried by a request
 */
export function signatureOf(request: AuthRequest): Buffer {
  const authorization = String(request.headers['authorization']);
  return Buffer.from(authorization.slice(authorization.indexOf(':') + 1), 'base64');
}

export function withoutHeader(request: AuthRequest, name: string): AuthRequest {
  const headers = { ...request.headers };
  delete headers[name];
  return { ...request, headers };
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
