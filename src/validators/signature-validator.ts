/**
 * Shared-Key Signature Validation
 *
 * Verifies requests signed with `Authorization: <scheme> <account>:<signature>`
 * where the signature is a base64 HMAC-SHA256 of the canonical request,
 * keyed with the account's shared secret.
 *
 * @packageDocumentation
 */

import { createHash, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import {
  CONTENT_SHA256_HEADER,
  DATE_HEADER,
  SCOPES_HEADER,
  createCanonicalString,
  getHeader,
  getTimestampHeader,
} from '../core/canonical';
import {
  InvalidArgumentError,
  SecretResolverError,
  malformedCredential,
  missingRequiredField,
  validationError,
} from '../core/errors';
import { parseSettings } from '../config';
import type {
  AuthRequest,
  Credential,
  Identity,
  SecretResolver,
  SignatureValidatorOptions,
  ValidationError,
  ValidationResult,
} from '../types';

/** HMAC-SHA256 output size in bytes */
export const SIGNATURE_LENGTH = 32;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Stands in for the secret of an unknown account so that path does the same work
const UNKNOWN_ACCOUNT_KEY = randomBytes(SIGNATURE_LENGTH);

/**
 * Compute the HMAC-SHA256 signature of a canonical string
 */
export function computeSignature(secret: Buffer | string, canonical: string): Buffer {
  return createHmac('sha256', secret).update(canonical, 'utf8').digest();
}

/**
 * Base64 SHA-256 digest of a request body
 */
export function computeContentHash(body: string | Buffer): string {
  return createHash('sha256').update(body).digest('base64');
}

/**
 * Parse an Authorization header value
 *
 * Anything other than exactly `<scheme> <account>:<base64>` with a 32-byte
 * signature is malformed.
 */
export function parseAuthorization(
  header: string | undefined,
  scheme: string
): Credential | ValidationError {
  if (!header) {
    return malformedCredential('Authorization header is required');
  }

  const separator = header.indexOf(' ');
  if (separator === -1 || header.slice(0, separator) !== scheme) {
    return malformedCredential('Unsupported authorization scheme');
  }

  const credential = header.slice(separator + 1);
  const colon = credential.indexOf(':');
  if (colon === -1) {
    return malformedCredential('Credential must have the form <account>:<signature>');
  }

  const account = credential.slice(0, colon);
  const encoded = credential.slice(colon + 1);

  if (!account || /\s/.test(account)) {
    return malformedCredential('Account is missing or invalid');
  }
  if (!encoded || !BASE64.test(encoded)) {
    return malformedCredential('Signature is not valid base64');
  }

  const signature = Buffer.from(encoded, 'base64');
  if (signature.length !== SIGNATURE_LENGTH) {
    return malformedCredential('Signature has the wrong length');
  }

  return { account, signature };
}

/**
 * Parse an IMF-fixdate timestamp (`Sun, 06 Nov 1994 08:49:37 GMT`)
 *
 * @returns Milliseconds since the epoch, or undefined when the value is not
 * in that exact form
 */
export function parseTimestamp(value: string): number | undefined {
  const ms = Date.parse(value);
  if (Number.isNaN(ms) || new Date(ms).toUTCString() !== value) {
    return undefined;
  }
  return ms;
}

/**
 * Validator for shared-key signed requests
 *
 * Holds no per-request state; one instance can serve concurrent requests.
 */
export class SignatureValidator {
  private readonly secretResolver: SecretResolver;
  private readonly scheme: string;
  private readonly maxAge: number;
  private readonly clockSkewMs: number;
  private readonly now: () => number;

  /**
   * Create a new signature validator
   * @param options - Validator options
   */
  constructor(options: SignatureValidatorOptions) {
    if (typeof options?.secretResolver !== 'function') {
      throw new InvalidArgumentError('secretResolver', 'A secret resolver function is required');
    }

    const settings = parseSettings(options);
    this.secretResolver = options.secretResolver;
    this.scheme = settings.scheme;
    this.maxAge = settings.maxAge;
    this.clockSkewMs = settings.clockSkew * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Validate a signed request
   *
   * Checks, in order: credential format, timestamp presence and format,
   * freshness, required fields, then the signature. Only the resolver call
   * suspends. Errors thrown by the resolver propagate wrapped in
   * {@link SecretResolverError}.
   *
   * @param request - Request to validate
   * @param secretResolver - Overrides the configured resolver
   * @param maxAge - Overrides the configured maximum age, in seconds
   */
  public async validate(
    request: AuthRequest,
    secretResolver: SecretResolver = this.secretResolver,
    maxAge: number = this.maxAge
  ): Promise<ValidationResult> {
    if (!request) {
      throw new InvalidArgumentError('request');
    }
    if (!Number.isFinite(maxAge) || maxAge < 0) {
      throw new InvalidArgumentError('maxAge', 'maxAge must be a non-negative number of seconds');
    }

    const now = this.now();
    const validatedAt = new Date(now);

    const credential = parseAuthorization(getHeader(request.headers, 'authorization'), this.scheme);
    if ('kind' in credential) {
      return { success: false, error: credential, validatedAt };
    }

    const fail = (error: ValidationError): ValidationResult => ({
      success: false,
      error,
      account: credential.account,
      validatedAt,
    });

    const rawTimestamp = getTimestampHeader(request.headers);
    if (!rawTimestamp) {
      return fail(missingRequiredField(`${DATE_HEADER} header is required`));
    }
    const timestampMs = parseTimestamp(rawTimestamp);
    if (timestampMs === undefined) {
      return fail(missingRequiredField(`${DATE_HEADER} header must be an HTTP date`));
    }

    const age = now - timestampMs;
    if (age > maxAge * 1000 || age < -this.clockSkewMs) {
      return fail(validationError('Expired', 'Request expired'));
    }

    let secret: Buffer | null | undefined;
    try {
      secret = await secretResolver(credential.account);
    } catch (error) {
      throw new SecretResolverError(credential.account, error);
    }
    const key = secret && secret.length > 0 ? secret : UNKNOWN_ACCOUNT_KEY;

    const missing = findMissingField(request);
    if (missing) {
      return fail(missingRequiredField(missing));
    }

    const contentMatches = contentHashMatches(request);
    const expected = computeSignature(key, createCanonicalString(request));
    const signatureMatches = timingSafeEqual(expected, credential.signature);

    if (key === UNKNOWN_ACCOUNT_KEY) {
      return fail(validationError('UnknownAccount'));
    }
    if (!signatureMatches || !contentMatches) {
      return fail(validationError('SignatureMismatch'));
    }

    return {
      success: true,
      identity: createIdentity(credential.account, this.scheme, request),
      validatedAt,
    };
  }

  /**
   * Authorization scheme token this validator accepts
   */
  public getScheme(): string {
    return this.scheme;
  }

  /**
   * Get the maximum age for signed requests
   *
   * @returns Maximum age in seconds
   */
  public getMaxAge(): number {
    return this.maxAge;
  }
}

function declaresBody(request: AuthRequest): boolean {
  const length = Number.parseInt(getHeader(request.headers, 'content-length') ?? '', 10);
  return (
    length > 0 ||
    getHeader(request.headers, 'transfer-encoding') !== undefined ||
    (request.body !== undefined && request.body.length > 0)
  );
}

/**
 * Requests with a body must sign its type and digest
 */
function findMissingField(request: AuthRequest): string | undefined {
  if (!declaresBody(request)) {
    return undefined;
  }
  if (!getHeader(request.headers, 'content-type')) {
    return 'content-type header is required for requests with a body';
  }
  if (!getHeader(request.headers, CONTENT_SHA256_HEADER)) {
    return `${CONTENT_SHA256_HEADER} header is required for requests with a body`;
  }
  return undefined;
}

/**
 * Compare the signed body digest with the body, when the host supplied one
 */
function contentHashMatches(request: AuthRequest): boolean {
  const claimed = getHeader(request.headers, CONTENT_SHA256_HEADER);
  if (request.body === undefined || claimed === undefined) {
    return true;
  }

  const actual = Buffer.from(computeContentHash(request.body));
  const supplied = Buffer.from(claimed);
  return actual.length === supplied.length && timingSafeEqual(actual, supplied);
}

function createIdentity(account: string, scheme: string, request: AuthRequest): Identity {
  const scopes = (getHeader(request.headers, SCOPES_HEADER) ?? '')
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);

  return {
    account,
    authenticationType: scheme,
    claims: [
      { type: 'name', value: account },
      { type: 'authentication-method', value: scheme },
      ...scopes.map((value) => ({ type: 'scope', value })),
    ],
  };
}
