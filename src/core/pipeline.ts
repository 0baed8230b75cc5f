/**
 * Framework-neutral request pipeline
 *
 * A pipeline is an ordered list of stages built once at start-up. Each stage
 * gets the request, the next stage and a per-request context, and either
 * answers itself or calls `next` with an enriched copy of the context.
 *
 * @packageDocumentation
 */

import { SharedKeyAuthenticator } from './authenticator';
import { InvalidArgumentError } from './errors';
import type { AuthenticatorOptions, AuthRequest, Identity } from '../types';

/**
 * Request-scoped values threaded through the pipeline
 *
 * A new object is created for every request; stages never share one.
 */
export interface RequestContext {
  /** Identity established by the authentication stage */
  readonly identity?: Identity;
  /** Aborted when the request is cancelled upstream */
  readonly signal?: AbortSignal;
  readonly [key: string]: unknown;
}

export interface PipelineResponse {
  status: number;
  headers?: Record<string, string>;
  body?: unknown;
}

export type NextStage = (request: AuthRequest, context: RequestContext) => Promise<PipelineResponse>;

export interface PipelineStage {
  readonly name: string;
  handle(request: AuthRequest, next: NextStage, context: RequestContext): Promise<PipelineResponse>;
}

/**
 * Pipeline stage that authenticates shared-key signed requests
 *
 * @example
 * ```typescript
 * const handler = composePipeline(
 *   [new SharedKeyAuthStage({ secretResolver: (account) => secrets.get(account) })],
 *   async (request, context) => ({ status: 200, body: { account: context.identity?.account } })
 * );
 * ```
 */
export class SharedKeyAuthStage implements PipelineStage {
  public readonly name = 'shared-key-auth';
  private readonly authenticator: SharedKeyAuthenticator;

  constructor(options: AuthenticatorOptions | SharedKeyAuthenticator) {
    this.authenticator =
      options instanceof SharedKeyAuthenticator ? options : new SharedKeyAuthenticator(options);
  }

  /**
   * Authenticate the request, then forward it with the identity attached
   *
   * Rejected requests never reach `next`. Throws when `request` is missing
   * or the context's signal is aborted.
   */
  public async handle(
    request: AuthRequest,
    next: NextStage,
    context: RequestContext = {}
  ): Promise<PipelineResponse> {
    if (!request) {
      throw new InvalidArgumentError('request');
    }
    if (typeof next !== 'function') {
      throw new InvalidArgumentError('next', 'next must be a function');
    }

    const outcome = await this.authenticator.authenticate(request, { signal: context.signal });
    if (!outcome.success) {
      const { status, headers, body } = outcome.rejection;
      return { status, headers: { ...headers }, body: { ...body } };
    }

    return next(request, { ...context, identity: outcome.identity });
  }
}

/**
 * Compose stages into a single handler
 *
 * @param stages - Stages, outermost first
 * @param terminal - Application handler reached after the last stage
 */
export function composePipeline(
  stages: readonly PipelineStage[],
  terminal: NextStage
): (request: AuthRequest, context?: RequestContext) => Promise<PipelineResponse> {
  const chain = stages.reduceRight<NextStage>(
    (next, stage) => (request, context) => stage.handle(request, next, context),
    terminal
  );
  return (request, context = {}) => chain(request, context);
}
