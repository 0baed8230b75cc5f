/**
 * Hono Middleware for shared-key authentication
 *
 * Verifies signed requests and stores the caller's identity in the context
 * variable `sharedKey`. The request's abort signal cancels processing. The
 * identity transformer receives the absolute request URL.
 *
 * @packageDocumentation
 */

import type { Context, MiddlewareHandler } from 'hono';
import { SharedKeyAuthenticator } from '../core/authenticator';
import type { AuthenticatorOptions, Identity, Rejection } from '../types';

declare module 'hono' {
  interface ContextVariableMap {
    sharedKey: Identity;
  }
}

/**
 * Options for shared-key Hono middleware
 */
export interface SharedKeyHonoOptions extends AuthenticatorOptions {
  /**
   * Custom rejection handler
   * If not provided, responds with the rejection as JSON
   */
  onError?: (rejection: Rejection, c: Context) => Response | Promise<Response>;

  /**
   * Custom success handler, called before the next handler
   */
  onSuccess?: (identity: Identity, c: Context) => void | Promise<void>;
}

/**
 * Create shared-key Hono middleware
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { createSharedKeyHonoMiddleware } from 'shared-key-auth';
 *
 * const app = new Hono();
 *
 * app.use(
 *   '/api/*',
 *   createSharedKeyHonoMiddleware({
 *     secretResolver: async (account) => await secrets.find(account),
 *   })
 * );
 *
 * app.get('/api/data', (c) => c.json({ account: c.get('sharedKey').account }));
 * ```
 */
export function createSharedKeyHonoMiddleware(options: SharedKeyHonoOptions): MiddlewareHandler {
  const authenticator = new SharedKeyAuthenticator(options);

  return async (c: Context, next) => {
    const outcome = await authenticator.authenticate(
      {
        method: c.req.method,
        url: c.req.url,
        headers: Object.fromEntries(c.req.raw.headers.entries()),
        body: await getRequestBody(c),
      },
      { signal: c.req.raw.signal }
    );

    if (!outcome.success) {
      return handleError(outcome.rejection, c, options.onError);
    }

    c.set('sharedKey', outcome.identity);

    if (options.onSuccess) {
      await options.onSuccess(outcome.identity, c);
    }

    await next();
  };
}

/**
 * Get the raw request body bytes
 *
 * Read as bytes, not text, so the digest covers exactly what was sent. Hono
 * caches the body, so later handlers can still read it.
 */
async function getRequestBody(c: Context): Promise<Buffer | undefined> {
  const method = c.req.method.toUpperCase();
  if (method === 'GET' || method === 'HEAD' || method === 'OPTIONS') {
    return undefined;
  }

  const body = await c.req.arrayBuffer();
  return body.byteLength > 0 ? Buffer.from(body) : undefined;
}

function handleError(
  rejection: Rejection,
  c: Context,
  customHandler?: (rejection: Rejection, c: Context) => Response | Promise<Response>
): Response | Promise<Response> {
  if (customHandler) {
    return customHandler(rejection, c);
  }

  return c.json(rejection.body, rejection.status, rejection.headers);
}
