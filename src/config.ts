/**
 * Configuration
 *
 * Options are validated once, when an authenticator or validator is built.
 * There is no reconfiguration at runtime.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { InvalidArgumentError } from './core/errors';

const HTTP_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Scalar options shared by every entry point
 */
export const sharedKeyOptionsSchema = z.object({
  scheme: z.string().regex(HTTP_TOKEN, 'scheme must be a single HTTP token').default('SharedKey'),
  maxAge: z.number().finite().nonnegative('maxAge must not be negative').default(300),
  clockSkew: z.number().finite().nonnegative('clockSkew must not be negative').default(60),
  expiredStatus: z.union([z.literal(401), z.literal(403)]).default(403),
  distinguishUnknownAccountInLogs: z.boolean().default(false),
  logLevel: logLevelSchema.default('info'),
});

export type SharedKeySettings = z.infer<typeof sharedKeyOptionsSchema>;
export type SharedKeySettingsInput = z.input<typeof sharedKeyOptionsSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  SHARED_KEY_SCHEME: z.string().optional(),
  SHARED_KEY_MAX_AGE: z.coerce.number().optional(),
  SHARED_KEY_CLOCK_SKEW: z.coerce.number().optional(),
  SHARED_KEY_EXPIRED_STATUS: z.coerce.number().optional(),
  SHARED_KEY_DISTINGUISH_UNKNOWN: envBoolean.optional(),
  LOG_LEVEL: z.string().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate options and fill in defaults
 *
 * Keys other than the scalar settings (resolver, logger, ...) are ignored.
 *
 * @throws InvalidArgumentError when an option is out of range
 */
export function parseSettings(input: unknown): SharedKeySettings {
  const result = sharedKeyOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidArgumentError('options', `Invalid shared-key options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read settings from environment variables
 *
 * - `SHARED_KEY_SCHEME`
 * - `SHARED_KEY_MAX_AGE` (seconds)
 * - `SHARED_KEY_CLOCK_SKEW` (seconds)
 * - `SHARED_KEY_EXPIRED_STATUS` (401 or 403)
 * - `SHARED_KEY_DISTINGUISH_UNKNOWN` (true/false)
 * - `LOG_LEVEL`
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SharedKeySettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidArgumentError('env', `Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return parseSettings({
    scheme: vars.SHARED_KEY_SCHEME,
    maxAge: vars.SHARED_KEY_MAX_AGE,
    clockSkew: vars.SHARED_KEY_CLOCK_SKEW,
    expiredStatus: vars.SHARED_KEY_EXPIRED_STATUS,
    distinguishUnknownAccountInLogs: vars.SHARED_KEY_DISTINGUISH_UNKNOWN,
    logLevel: vars.LOG_LEVEL,
  });
}
