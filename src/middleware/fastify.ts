/**
 * Fastify Plugin for shared-key authentication
 *
 * Verifies the signed request in a preHandler and decorates the request with
 * the caller's identity. The identity transformer receives the absolute
 * request URL.
 *
 * @packageDocumentation
 */

import type {
  FastifyInstance,
  FastifyRequest,
  FastifyReply,
  FastifyPluginCallback,
} from 'fastify';
import { SharedKeyAuthenticator } from '../core/authenticator';
import type { AuthenticatorOptions, AuthRequest, Identity, Rejection } from '../types';

/**
 * Options for the shared-key Fastify plugin
 */
export interface SharedKeyFastifyOptions extends AuthenticatorOptions {
  /**
   * Custom rejection handler
   * If not provided, sends the rejection as JSON
   */
  onError?: (
    rejection: Rejection,
    request: FastifyRequest,
    reply: FastifyReply
  ) => void | Promise<void>;

  /**
   * Custom success handler, called after the identity is attached
   */
  onSuccess?: (
    identity: Identity,
    request: FastifyRequest,
    reply: FastifyReply
  ) => void | Promise<void>;
}

export type SharedKeyFastifyPreHandler = (
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<FastifyReply | void>;

// Extend Fastify types
declare module 'fastify' {
  interface FastifyRequest {
    sharedKey?: Identity | null;
  }

  interface FastifyInstance {
    sharedKeyAuth: SharedKeyFastifyPreHandler;
  }
}

/**
 * Shared-key Fastify plugin
 *
 * Registers `request.sharedKey` and an instance-level `sharedKeyAuth`
 * preHandler.
 *
 * @example
 * ```typescript
 * import fastify from 'fastify';
 * import { sharedKeyFastifyPlugin } from 'shared-key-auth';
 *
 * const app = fastify();
 *
 * app.register(async (scope) => {
 *   await scope.register(sharedKeyFastifyPlugin, {
 *     secretResolver: async (account) => await secrets.find(account),
 *   });
 *
 *   scope.get('/data', { preHandler: scope.sharedKeyAuth }, async (request) => {
 *     return { account: request.sharedKey?.account };
 *   });
 * });
 * ```
 */
export const sharedKeyFastifyPlugin: FastifyPluginCallback<SharedKeyFastifyOptions> = (
  fastify: FastifyInstance,
  options: SharedKeyFastifyOptions,
  done: (err?: Error) => void
) => {
  const preHandler = createSharedKeyFastifyPreHandler(options);

  if (!fastify.hasRequestDecorator('sharedKey')) {
    fastify.decorateRequest('sharedKey', null);
  }
  fastify.decorate('sharedKeyAuth', preHandler);

  done();
};

/**
 * Create a standalone shared-key preHandler for Fastify
 *
 * Logs through `request.log` unless a logger is configured.
 *
 * @example
 * ```typescript
 * const sharedKeyAuth = createSharedKeyFastifyPreHandler({
 *   secretResolver: (account) => secrets.get(account),
 * });
 *
 * app.get('/data', { preHandler: sharedKeyAuth }, async (request) => {
 *   return { account: request.sharedKey?.account };
 * });
 * ```
 */
export function createSharedKeyFastifyPreHandler(
  options: SharedKeyFastifyOptions
): SharedKeyFastifyPreHandler {
  const authenticator = new SharedKeyAuthenticator(options);

  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
    const outcome = await authenticator.authenticate(toAuthRequest(request), {
      logger: request.log,
    });

    if (!outcome.success) {
      if (options.onError) {
        await options.onError(outcome.rejection, request, reply);
        return reply;
      }
      const { status, headers, body } = outcome.rejection;
      return reply.code(status).headers(headers).send(body);
    }

    request.sharedKey = outcome.identity;

    if (options.onSuccess) {
      await options.onSuccess(outcome.identity, request, reply);
    }
  };
}

function toAuthRequest(request: FastifyRequest): AuthRequest {
  return {
    method: request.method,
    url: `${request.protocol}://${request.hostname}${request.url}`,
    headers: request.headers,
    body: getRawBody(request.body),
  };
}

/**
 * Only raw bodies can be checked against the content digest; parsed JSON is
 * skipped rather than re-serialized.
 */
function getRawBody(body: unknown): string | Buffer | undefined {
  if (Buffer.isBuffer(body) || typeof body === 'string') {
    return body;
  }
  return undefined;
}
