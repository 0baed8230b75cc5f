/**
 * Client-side request signing
 *
 * Produces the headers a verifier built on {@link SignatureValidator}
 * accepts. Used by clients, and by tests to build signed requests.
 *
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';
import {
  CONTENT_SHA256_HEADER,
  DATE_HEADER,
  SCOPES_HEADER,
  createCanonicalString,
  getHeader,
} from './canonical';
import { computeContentHash, computeSignature } from '../validators/signature-validator';

export interface SignRequestOptions {
  /** Account the request is made for */
  account: string;
  /** Shared secret of the account */
  secret: Buffer | string;
  method: string;
  /** Path and query, or an absolute URL */
  url: string;
  /** Headers to send; x-sk-* headers among them are signed */
  headers?: Record<string, string>;
  body?: string | Buffer;
  /**
   * Content type for requests with a body
   * @default 'application/octet-stream'
   */
  contentType?: string;
  /** Scopes to claim; sent signed in x-sk-scopes */
  scopes?: string[];
  /**
   * Authorization scheme
   * @default 'SharedKey'
   */
  scheme?: string;
  /**
   * Request time
   * @default new Date()
   */
  date?: Date;
}

/**
 * Sign a request
 *
 * @returns The given headers plus the timestamp, digest and Authorization
 * headers
 *
 * @example
 * ```typescript
 * const headers = signRequest({
 *   account: 'reports',
 *   secret: process.env.REPORTS_SECRET ?? '',
 *   method: 'POST',
 *   url: '/v1/reports?format=csv',
 *   body: JSON.stringify(report),
 *   contentType: 'application/json',
 * });
 * await fetch(`${baseUrl}/v1/reports?format=csv`, { method: 'POST', headers, body });
 * ```
 */
export function signRequest(options: SignRequestOptions): Record<string, string> {
  const headers: Record<string, string> = { ...options.headers };
  setHeader(headers, DATE_HEADER, (options.date ?? new Date()).toUTCString());

  if (options.body !== undefined && options.body.length > 0) {
    setHeader(headers, CONTENT_SHA256_HEADER, computeContentHash(options.body));
    if (!getHeader(headers, 'content-type')) {
      headers['content-type'] = options.contentType ?? 'application/octet-stream';
    }
  }

  if (options.scopes && options.scopes.length > 0) {
    setHeader(headers, SCOPES_HEADER, options.scopes.join(','));
  }

  const canonical = createCanonicalString({
    method: options.method,
    url: options.url,
    headers,
  });
  const signature = computeSignature(options.secret, canonical).toString('base64');

  const scheme = options.scheme ?? 'SharedKey';
  setHeader(headers, 'authorization', `${scheme} ${options.account}:${signature}`);
  return headers;
}

/**
 * Set a header, dropping any entry whose name differs only in case
 */
function setHeader(headers: Record<string, string>, name: string, value: string): void {
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === name) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

/**
 * Generate a random shared secret
 *
 * @param length - Length in bytes (default 32 = 256 bits)
 */
export function generateSecret(length: number = 32): Buffer {
  return randomBytes(length);
}
