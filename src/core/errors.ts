/**
 * Error types
 *
 * Authentication failures are values (see {@link ValidationError}); the
 * classes here are for programmer errors and broken collaborators.
 *
 * @packageDocumentation
 */

import type { ValidationError, ValidationErrorKind } from '../types';

/**
 * Thrown when a caller passes an argument that cannot be used, such as a
 * missing request or invalid options
 */
export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    message: string = `${argument} is required`
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Wraps an error raised by the configured identity transformer
 */
export class TransformerFailureError extends Error {
  constructor(cause: unknown) {
    super(
      `Identity transformer failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'TransformerFailureError';
  }
}

/**
 * Wraps an error raised by the configured secret resolver
 */
export class SecretResolverError extends Error {
  constructor(
    public readonly account: string,
    cause: unknown
  ) {
    super(
      `Secret resolver failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'SecretResolverError';
  }
}

/**
 * Build a tagged validation error
 */
export function validationError(kind: ValidationErrorKind, reason?: string): ValidationError {
  return reason === undefined ? { kind } : { kind, reason };
}

export const malformedCredential = (reason: string): ValidationError =>
  validationError('MalformedCredential', reason);

export const missingRequiredField = (reason: string): ValidationError =>
  validationError('MissingRequiredField', reason);
