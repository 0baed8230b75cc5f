/**
 * Maps validation failures to HTTP rejections
 *
 * The three credential failures share one response, byte for byte, so a
 * caller cannot tell an unknown account from a bad signature.
 *
 * @packageDocumentation
 */

import type { ExpiredStatus, Rejection, ValidationError } from '../types';

const NO_STORE = { 'cache-control': 'no-store' };

function unauthorized(scheme: string, message: string): Rejection {
  return {
    status: 401,
    headers: { ...NO_STORE, 'www-authenticate': scheme },
    body: { error: 'Authentication failed', message },
  };
}

/**
 * Build the rejection for a validation error
 *
 * @param error - Validation failure
 * @param scheme - Authorization scheme, used for the WWW-Authenticate challenge
 * @param expiredStatus - Status for expired requests
 */
export function toRejection(
  error: ValidationError,
  scheme: string,
  expiredStatus: ExpiredStatus
): Rejection {
  switch (error.kind) {
    case 'MalformedCredential':
    case 'UnknownAccount':
    case 'SignatureMismatch':
      return unauthorized(scheme, 'Unauthorized');

    case 'Expired':
      if (expiredStatus === 401) {
        return unauthorized(scheme, 'Request expired');
      }
      return {
        status: 403,
        headers: { ...NO_STORE },
        body: { error: 'Forbidden', message: 'Request expired' },
      };

    case 'MissingRequiredField':
      return {
        status: 412,
        headers: { ...NO_STORE },
        body: { error: 'Precondition failed', message: error.reason ?? 'Precondition failed' },
      };
  }
}

/**
 * Rejection for failures of the host's collaborators
 */
export function internalErrorRejection(): Rejection {
  return {
    status: 500,
    headers: { ...NO_STORE },
    body: { error: 'Internal server error', message: 'Internal server error' },
  };
}
