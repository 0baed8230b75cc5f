/**
 * Request canonicalization (SharedKey v1)
 *
 * Signer and verifier must produce the same bytes for the same request, so
 * every rule here is part of the wire contract. Changing any of them is a
 * breaking protocol change.
 *
 * Canonical string, lines joined with "\n":
 *
 * ```
 * METHOD
 * x-sk-content-sha256 value (or empty)
 * content-type value (or empty)
 * timestamp header value, as sent
 * canonical resource
 * name:value  (one line per extension header, sorted by name)
 * ```
 *
 * @packageDocumentation
 */

import type { AuthRequest, HeaderValue } from '../types';

/** Prefix of headers that take part in the signature */
export const EXTENSION_HEADER_PREFIX = 'x-sk-';

/** Request timestamp header */
export const DATE_HEADER = 'x-sk-date';

/** Base64 SHA-256 of the request body */
export const CONTENT_SHA256_HEADER = 'x-sk-content-sha256';

/** Comma-separated scopes granted to the signed request */
export const SCOPES_HEADER = 'x-sk-scopes';

/**
 * Look up a header case-insensitively
 *
 * Arrays yield their first entry. Empty values count as absent.
 */
export function getHeader(
  headers: Readonly<Record<string, HeaderValue>>,
  name: string
): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== target) {
      continue;
    }
    const first = Array.isArray(value) ? value[0] : value;
    if (first) {
      return first;
    }
  }
  return undefined;
}

/**
 * Timestamp header value: x-sk-date, falling back to Date
 */
export function getTimestampHeader(
  headers: Readonly<Record<string, HeaderValue>>
): string | undefined {
  return getHeader(headers, DATE_HEADER) ?? getHeader(headers, 'date');
}

/**
 * Canonicalize the request target
 *
 * The path is kept exactly as sent. Query parameters are form-decoded,
 * then re-encoded with {@link encodeQueryComponent} so `\n`, `:` and `,`
 * never appear raw; grouped by key, keys sorted by code unit order and
 * values sorted, one `\nkey:v1,v2` line per key. Fragments are dropped.
 *
 * @param url - Path and query, or an absolute URL
 */
export function canonicalizeResource(url: string): string {
  const { path, query } = splitTarget(url);

  const grouped = new Map<string, string[]>();
  for (const [rawKey, rawValue] of new URLSearchParams(query)) {
    const key = encodeQueryComponent(rawKey);
    const value = encodeQueryComponent(rawValue);
    const values = grouped.get(key);
    if (values) {
      values.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }

  const lines = [...grouped.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([key, values]) => `\n${key}:${[...values].sort().join(',')}`);

  return path + lines.join('');
}

/**
 * Canonicalize extension headers
 *
 * Every `x-sk-*` header except the timestamp and content digest (which have
 * their own lines) becomes `name:value`, name lower-cased, whitespace runs
 * in the value collapsed to one space and trimmed. Sorted by name, so the
 * order headers were stored in does not matter.
 */
export function canonicalizeHeaders(
  headers: Readonly<Record<string, HeaderValue>>
): string[] {
  const collected = new Map<string, string[]>();

  for (const [rawName, value] of Object.entries(headers)) {
    const name = rawName.toLowerCase();
    if (
      !name.startsWith(EXTENSION_HEADER_PREFIX) ||
      name === DATE_HEADER ||
      name === CONTENT_SHA256_HEADER ||
      value === undefined
    ) {
      continue;
    }

    const normalized = (Array.isArray(value) ? value : [value]).map((v) =>
      v.replace(/\s+/g, ' ').trim()
    );
    const existing = collected.get(name);
    if (existing) {
      existing.push(...normalized);
    } else {
      collected.set(name, normalized);
    }
  }

  return [...collected.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([name, values]) => `${name}:${values.join(',')}`);
}

/**
 * Build the canonical string for a request
 *
 * Missing optional fields become empty lines; whether a field is required
 * is decided by the validator before this is called.
 */
export function createCanonicalString(request: AuthRequest): string {
  const { headers } = request;

  return [
    request.method.toUpperCase(),
    getHeader(headers, CONTENT_SHA256_HEADER) ?? '',
    getHeader(headers, 'content-type') ?? '',
    getTimestampHeader(headers) ?? '',
    canonicalizeResource(request.url),
    ...canonicalizeHeaders(headers),
  ].join('\n');
}

/**
 * Percent-encode a decoded query key or value
 *
 * One spelling per string, whatever encoding the client sent: `a b`,
 * `a+b` and `a%20b` all become `a%20b`.
 */
function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value);
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function splitTarget(url: string): { path: string; query: string } {
  // Absolute URL: drop scheme and authority
  const target = (url.split('#')[0] ?? '').replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?]*/i, '');

  const queryStart = target.indexOf('?');
  const path = queryStart === -1 ? target : target.slice(0, queryStart);
  const query = queryStart === -1 ? '' : target.slice(queryStart + 1);

  return { path: path || '/', query };
}
