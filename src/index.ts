/**
 * Shared-key HMAC request authentication
 *
 * @packageDocumentation
 */

export * from './types';
export {
  sharedKeyOptionsSchema,
  parseSettings,
  loadConfigFromEnv,
  type SharedKeySettings,
  type SharedKeySettingsInput,
  type LogLevel,
} from './config';
export {
  CONTENT_SHA256_HEADER,
  DATE_HEADER,
  EXTENSION_HEADER_PREFIX,
  SCOPES_HEADER,
  canonicalizeHeaders,
  canonicalizeResource,
  createCanonicalString,
  getHeader,
} from './core/canonical';
export { InvalidArgumentError, SecretResolverError, TransformerFailureError } from './core/errors';
export { SharedKeyAuthenticator, type AuthenticateOptions } from './core/authenticator';
export {
  SharedKeyAuthStage,
  composePipeline,
  type NextStage,
  type PipelineResponse,
  type PipelineStage,
  type RequestContext,
} from './core/pipeline';
export { toRejection } from './core/rejection';
export { signRequest, generateSecret, type SignRequestOptions } from './core/signer';
export {
  SignatureValidator,
  SIGNATURE_LENGTH,
  computeSignature,
  parseAuthorization,
  parseTimestamp,
} from './validators/signature-validator';
export {
  sharedKeyFastifyPlugin,
  createSharedKeyFastifyPreHandler,
  type SharedKeyFastifyOptions,
  type SharedKeyFastifyPreHandler,
} from './middleware/fastify';
export {
  createSharedKeyKoaMiddleware,
  type SharedKeyKoaOptions,
  type SharedKeyKoaState,
} from './middleware/koa';
export { createSharedKeyHonoMiddleware, type SharedKeyHonoOptions } from './middleware/hono';
