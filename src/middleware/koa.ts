/**
 * Koa Middleware for shared-key authentication
 *
 * Verifies signed requests and attaches the caller's identity to ctx.state.
 * The signature and the identity transformer both see `ctx.href`, the
 * original absolute URL, so mounted sub-apps still verify.
 *
 * @packageDocumentation
 */

import type { Context, Next, Middleware } from 'koa';
import { SharedKeyAuthenticator } from '../core/authenticator';
import type { AuthenticatorOptions, Identity, Rejection } from '../types';

/**
 * Koa state extended with the authenticated identity
 */
export interface SharedKeyKoaState {
  sharedKey?: Identity;
}

/**
 * Options for shared-key Koa middleware
 */
export interface SharedKeyKoaOptions extends AuthenticatorOptions {
  /**
   * Custom rejection handler
   * If not provided, responds with the rejection as JSON
   */
  onError?: (rejection: Rejection, ctx: Context) => void | Promise<void>;

  /**
   * Custom success handler, called before the next middleware
   */
  onSuccess?: (identity: Identity, ctx: Context) => void | Promise<void>;
}

/**
 * Create shared-key Koa middleware
 *
 * @example
 * ```typescript
 * import Koa from 'koa';
 * import { createSharedKeyKoaMiddleware } from 'shared-key-auth';
 *
 * const app = new Koa();
 *
 * app.use(
 *   createSharedKeyKoaMiddleware({
 *     secretResolver: async (account) => await secrets.find(account),
 *   })
 * );
 *
 * app.use(async (ctx) => {
 *   ctx.body = { account: ctx.state.sharedKey?.account };
 * });
 * ```
 */
export function createSharedKeyKoaMiddleware(options: SharedKeyKoaOptions): Middleware {
  const authenticator = new SharedKeyAuthenticator(options);

  return async (ctx: Context, next: Next): Promise<void> => {
    const outcome = await authenticator.authenticate({
      method: ctx.method,
      url: ctx.href,
      headers: ctx.headers,
      body: getRawBody(ctx),
    });

    if (!outcome.success) {
      await handleError(outcome.rejection, ctx, options.onError);
      return;
    }

    ctx.state['sharedKey'] = outcome.identity;

    if (options.onSuccess) {
      await options.onSuccess(outcome.identity, ctx);
    }

    await next();
  };
}

/**
 * Raw body left by koa-bodyparser, or a string/Buffer body
 */
function getRawBody(ctx: Context): string | Buffer | undefined {
  const request = ctx.request;
  if ('rawBody' in request && typeof request.rawBody === 'string') {
    return request.rawBody;
  }
  if ('body' in request && (typeof request.body === 'string' || Buffer.isBuffer(request.body))) {
    return request.body;
  }
  return undefined;
}

async function handleError(
  rejection: Rejection,
  ctx: Context,
  customHandler?: (rejection: Rejection, ctx: Context) => void | Promise<void>
): Promise<void> {
  if (customHandler) {
    await customHandler(rejection, ctx);
    return;
  }

  ctx.status = rejection.status;
  ctx.set(rejection.headers);
  ctx.body = rejection.body;
}
