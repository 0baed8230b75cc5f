/**
 * Shared types for shared-key authentication
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../config';

/**
 * Header values as HTTP frameworks expose them
 */
export type HeaderValue = string | string[] | undefined;

/**
 * Read-only view of an inbound request
 *
 * Header names are matched case-insensitively. The validator never mutates
 * the request.
 */
export interface AuthRequest {
  /** HTTP method (GET, POST, etc.) */
  readonly method: string;
  /**
   * Absolute request URL; path and query alone are also accepted
   * Adapters pass the absolute form, which the identity transformer receives.
   */
  readonly url: string;
  /** Request headers */
  readonly headers: Readonly<Record<string, HeaderValue>>;
  /**
   * Raw request body, when the host has it
   * Used to check the content digest header.
   */
  readonly body?: string | Buffer;
}

/**
 * Credential parsed from the Authorization header
 */
export interface Credential {
  /** Account identifier (never empty) */
  account: string;
  /** Caller-supplied signature bytes (base64-decoded) */
  signature: Buffer;
}

/**
 * A single claim about an authenticated caller
 */
export interface Claim {
  type: string;
  value: string;
}

/**
 * Identity established by a successful validation
 */
export interface Identity {
  /** Account the request was signed for */
  account: string;
  /** Authorization scheme that authenticated the caller */
  authenticationType: string;
  /** Claims; a type may appear more than once */
  claims: Claim[];
}

/**
 * Why a request failed validation
 */
export type ValidationErrorKind =
  | 'MalformedCredential'
  | 'UnknownAccount'
  | 'SignatureMismatch'
  | 'Expired'
  | 'MissingRequiredField';

/**
 * Tagged validation failure
 */
export interface ValidationError {
  kind: ValidationErrorKind;
  /** Short diagnostic; never contains key material */
  reason?: string;
}

/**
 * Outcome of validating one request
 */
export type ValidationResult =
  | { success: true; identity: Identity; validatedAt: Date }
  | {
      success: false;
      error: ValidationError;
      /** Account named by the credential, once it parsed */
      account?: string;
      validatedAt: Date;
    };

/**
 * Resolves an account identifier to its shared secret
 *
 * Returns null or undefined when the account does not exist. May be called
 * concurrently for many requests.
 */
export type SecretResolver = (
  account: string
) => Promise<Buffer | null | undefined> | Buffer | null | undefined;

/**
 * Turns a validated identity into the identity the application sees
 *
 * Throwing fails the request with a server error, not an authentication
 * rejection.
 */
export type IdentityTransformer = (
  resource: string,
  identity: Identity
) => Promise<Identity> | Identity;

/**
 * Minimal structured logger; pino and Fastify's request.log satisfy it
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/**
 * Status used for expired requests
 */
export type ExpiredStatus = 401 | 403;

/**
 * Options for the signature validator
 */
export interface SignatureValidatorOptions {
  /**
   * Resolves an account to its secret
   */
  secretResolver: SecretResolver;

  /**
   * Authorization scheme token
   * @default 'SharedKey'
   */
  scheme?: string;

  /**
   * Maximum request age in seconds
   * @default 300 (5 minutes)
   */
  maxAge?: number;

  /**
   * Tolerated clock skew for timestamps in the future, in seconds
   * @default 60
   */
  clockSkew?: number;

  /**
   * Clock, in milliseconds since the epoch
   * @default Date.now
   */
  now?: () => number;
}

/**
 * Options shared by the authenticator, the pipeline stage and the
 * framework adapters
 */
export interface AuthenticatorOptions extends SignatureValidatorOptions {
  /**
   * Optional identity transformer
   */
  identityTransformer?: IdentityTransformer;

  /**
   * Status for expired requests
   * @default 403
   */
  expiredStatus?: ExpiredStatus;

  /**
   * Log unknown accounts separately from signature mismatches.
   * Responses never distinguish them.
   * @default false
   */
  distinguishUnknownAccountInLogs?: boolean;

  /**
   * Logger; a pino logger is created when omitted
   */
  logger?: Logger;

  /**
   * Level of the default logger
   * @default 'info'
   */
  logLevel?: LogLevel;

  /**
   * Enable debug logging on the default logger; overrides logLevel
   * @default false
   */
  debug?: boolean;
}

/**
 * Framework-neutral response written for a rejected request
 */
export interface Rejection {
  status: 401 | 403 | 412 | 500;
  headers: Record<string, string>;
  body: {
    error: string;
    message: string;
  };
}

/**
 * Outcome of authenticating one request, including identity transformation
 */
export type AuthenticationOutcome =
  | { success: true; identity: Identity }
  | { success: false; rejection: Rejection };
