import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, parseSettings } from '../src/config';
import { InvalidArgumentError } from '../src/core/errors';

describe('configuration', () => {
  describe('parseSettings', () => {
    it('should fill in defaults', () => {
      expect(parseSettings({})).toEqual({
        scheme: 'SharedKey',
        maxAge: 300,
        clockSkew: 60,
        expiredStatus: 403,
        distinguishUnknownAccountInLogs: false,
        logLevel: 'info',
      });
    });

    it('should ignore non-scalar options', () => {
      const settings = parseSettings({ secretResolver: () => null, maxAge: 60 });
      expect(settings.maxAge).toBe(60);
      expect(settings).not.toHaveProperty('secretResolver');
    });

    it('should accept a maxAge of zero', () => {
      expect(parseSettings({ maxAge: 0 }).maxAge).toBe(0);
    });

    it('should reject a negative maxAge', () => {
      expect(() => parseSettings({ maxAge: -1 })).toThrow(
        'Invalid shared-key options: maxAge: maxAge must not be negative'
      );
    });

    it('should reject an unsupported expired status', () => {
      expect(() => parseSettings({ expiredStatus: 404 })).toThrow(InvalidArgumentError);
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should use defaults for an empty environment', () => {
      expect(loadConfigFromEnv({})).toEqual(parseSettings({}));
    });

    it('should read settings from the environment', () => {
      expect(
        loadConfigFromEnv({
          SHARED_KEY_SCHEME: 'HMAC-SK',
          SHARED_KEY_MAX_AGE: '120',
          SHARED_KEY_CLOCK_SKEW: '5',
          SHARED_KEY_EXPIRED_STATUS: '401',
          SHARED_KEY_DISTINGUISH_UNKNOWN: 'true',
          LOG_LEVEL: 'warn',
        })
      ).toEqual({
        scheme: 'HMAC-SK',
        maxAge: 120,
        clockSkew: 5,
        expiredStatus: 401,
        distinguishUnknownAccountInLogs: true,
        logLevel: 'warn',
      });
    });

    it('should reject a malformed boolean', () => {
      expect(() => loadConfigFromEnv({ SHARED_KEY_DISTINGUISH_UNKNOWN: 'yes' })).toThrow(
        /^Invalid environment: SHARED_KEY_DISTINGUISH_UNKNOWN/
      );
    });

    it('should reject an unknown log level', () => {
      expect(() => loadConfigFromEnv({ LOG_LEVEL: 'verbose' })).toThrow(/logLevel/);
    });
  });
});
