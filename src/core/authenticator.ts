/**
 * Shared-key authenticator
 *
 * Runs the signature validator and the optional identity transformer for one
 * request and turns the outcome into either an identity or a rejection.
 * Framework adapters and the pipeline stage are thin wrappers around it.
 *
 * @packageDocumentation
 */

import { parseSettings } from '../config';
import type { SharedKeySettings } from '../config';
import { SignatureValidator } from '../validators/signature-validator';
import { InvalidArgumentError, SecretResolverError, TransformerFailureError } from './errors';
import { createLogger } from './logger';
import { internalErrorRejection, toRejection } from './rejection';
import type {
  AuthenticationOutcome,
  AuthenticatorOptions,
  AuthRequest,
  IdentityTransformer,
  Logger,
  ValidationResult,
} from '../types';

/**
 * Per-call overrides
 */
export interface AuthenticateOptions {
  /** Abort processing when the request goes away */
  signal?: AbortSignal;
  /** Logger for this request, e.g. Fastify's request.log */
  logger?: Logger;
}

export class SharedKeyAuthenticator {
  private readonly validator: SignatureValidator;
  private readonly settings: SharedKeySettings;
  private readonly transformer?: IdentityTransformer;
  private readonly logger: Logger;
  private readonly hasCustomLogger: boolean;

  constructor(options: AuthenticatorOptions) {
    this.validator = new SignatureValidator(options);
    this.settings = parseSettings(options);
    this.transformer = options.identityTransformer;
    this.hasCustomLogger = options.logger !== undefined;
    this.logger = options.logger ?? createLogger(options.debug ? 'debug' : this.settings.logLevel);
  }

  /**
   * Authenticate one request
   *
   * Validation failures and collaborator failures come back as rejections.
   * Only an aborted signal or a missing request throws.
   */
  public async authenticate(
    request: AuthRequest,
    options: AuthenticateOptions = {}
  ): Promise<AuthenticationOutcome> {
    if (!request) {
      throw new InvalidArgumentError('request');
    }

    const { signal } = options;
    const logger = this.hasCustomLogger ? this.logger : (options.logger ?? this.logger);
    signal?.throwIfAborted();

    let result: ValidationResult;
    try {
      result = await this.validator.validate(request);
    } catch (error) {
      if (error instanceof SecretResolverError) {
        logger.error({ err: error, account: error.account }, 'secret resolver failed');
      } else {
        logger.error({ err: error }, 'shared-key validation failed');
      }
      return { success: false, rejection: internalErrorRejection() };
    }
    signal?.throwIfAborted();

    if (!result.success) {
      const kind =
        result.error.kind === 'UnknownAccount' && !this.settings.distinguishUnknownAccountInLogs
          ? 'SignatureMismatch'
          : result.error.kind;
      logger.warn(
        { kind, account: result.account, reason: result.error.reason },
        'shared-key authentication rejected'
      );
      return {
        success: false,
        rejection: toRejection(result.error, this.settings.scheme, this.settings.expiredStatus),
      };
    }

    let identity = result.identity;
    if (this.transformer) {
      try {
        identity = await this.transformer(request.url, identity);
      } catch (error) {
        const failure = new TransformerFailureError(error);
        logger.error({ err: failure, account: identity.account }, failure.message);
        return { success: false, rejection: internalErrorRejection() };
      }
      signal?.throwIfAborted();
    }

    logger.debug({ account: identity.account }, 'shared-key authentication succeeded');
    return { success: true, identity };
  }
}
