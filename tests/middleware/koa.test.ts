import { describe, it, expect, vi } from 'vitest';
import { createSharedKeyKoaMiddleware } from '../../src/middleware/koa';
import type { Context, Next } from 'koa';
import type { AuthRequest, IdentityTransformer } from '../../src/types';
import { NOW, createMockLogger, now, resolveSecret, signedRequest, withoutHeader } from '../fixtures';

describe('Koa Middleware', () => {
  const logger = createMockLogger();

  function createMockContext(signed: AuthRequest, request: Record<string, unknown> = {}): Context {
    const ctx = {
      headers: { ...signed.headers },
      method: signed.method,
      url: signed.url,
      href: `https://api.example.com${signed.url}`,
      request,
      state: {},
      status: 404,
      body: undefined,
      set: vi.fn(),
    };
    return ctx as unknown as Context;
  }

  function createMockNext(): Next {
    return vi.fn().mockResolvedValue(undefined);
  }

  describe('authentication', () => {
    it('should attach the identity to ctx.state and continue', async () => {
      const middleware = createSharedKeyKoaMiddleware({ secretResolver: resolveSecret, now, logger });
      const ctx = createMockContext(signedRequest());
      const next = createMockNext();

      await middleware(ctx, next);

      expect(next).toHaveBeenCalled();
      expect(ctx.state.sharedKey).toEqual(
        expect.objectContaining({ account: 'alice', authenticationType: 'SharedKey' })
      );
    });

    it('should verify the raw body left by a body parser', async () => {
      const middleware = createSharedKeyKoaMiddleware({ secretResolver: resolveSecret, now, logger });
      const signed = signedRequest({ method: 'PUT', body: 'hello', contentType: 'text/plain' });

      const accepted = createMockContext(signed, { rawBody: 'hello', body: { parsed: true } });
      const acceptedNext = createMockNext();
      await middleware(accepted, acceptedNext);
      expect(acceptedNext).toHaveBeenCalled();

      const tampered = createMockContext(signed, { rawBody: 'hellO' });
      const tamperedNext = createMockNext();
      await middleware(tampered, tamperedNext);
      expect(tampered.status).toBe(401);
      expect(tamperedNext).not.toHaveBeenCalled();
    });

    it('should respond 401 for an unknown account', async () => {
      const middleware = createSharedKeyKoaMiddleware({ secretResolver: resolveSecret, now, logger });
      const ctx = createMockContext(
        signedRequest({ account: 'mallory', secret: Buffer.from('test-secret-mallory') })
      );
      const next = createMockNext();

      await middleware(ctx, next);

      expect(ctx.status).toBe(401);
      expect(ctx.set).toHaveBeenCalledWith({
        'cache-control': 'no-store',
        'www-authenticate': 'SharedKey',
      });
      expect(ctx.body).toEqual({ error: 'Authentication failed', message: 'Unauthorized' });
      expect(ctx.state.sharedKey).toBeUndefined();
      expect(next).not.toHaveBeenCalled();
    });

    it('should respond with the configured status for expired requests', async () => {
      const middleware = createSharedKeyKoaMiddleware({
        secretResolver: resolveSecret,
        now,
        logger,
        expiredStatus: 401,
      });
      const ctx = createMockContext(signedRequest({ date: new Date(NOW - 10 * 60 * 1000) }));

      await middleware(ctx, createMockNext());

      expect(ctx.status).toBe(401);
      expect(ctx.body).toEqual({ error: 'Authentication failed', message: 'Request expired' });
    });

    it('should respond 412 when the timestamp is missing', async () => {
      const middleware = createSharedKeyKoaMiddleware({ secretResolver: resolveSecret, now, logger });
      const ctx = createMockContext(withoutHeader(signedRequest(), 'x-sk-date'));

      await middleware(ctx, createMockNext());

      expect(ctx.status).toBe(412);
      expect(ctx.body).toEqual({
        error: 'Precondition failed',
        message: 'x-sk-date header is required',
      });
    });

    it('should pass the absolute URL to the identity transformer', async () => {
      const identityTransformer = vi.fn<IdentityTransformer>((_resource, identity) => identity);
      const middleware = createSharedKeyKoaMiddleware({
        secretResolver: resolveSecret,
        now,
        logger,
        identityTransformer,
      });

      await middleware(createMockContext(signedRequest({ url: '/data?x=1' })), createMockNext());

      expect(identityTransformer).toHaveBeenCalledWith(
        'https://api.example.com/data?x=1',
        expect.objectContaining({ account: 'alice' })
      );
    });

    it('should respond 500 when the resolver fails', async () => {
      const middleware = createSharedKeyKoaMiddleware({
        secretResolver: vi.fn().mockRejectedValue(new Error('Database error')),
        now,
        logger,
      });
      const ctx = createMockContext(signedRequest());
      const next = createMockNext();

      await middleware(ctx, next);

      expect(ctx.status).toBe(500);
      expect(next).not.toHaveBeenCalled();
    });
  });

  describe('custom handlers', () => {
    it('should call the custom error handler', async () => {
      const onError = vi.fn();
      const middleware = createSharedKeyKoaMiddleware({
        secretResolver: resolveSecret,
        now,
        logger,
        onError,
      });
      const ctx = createMockContext(withoutHeader(signedRequest(), 'authorization'));

      await middleware(ctx, createMockNext());

      expect(onError).toHaveBeenCalledWith(expect.objectContaining({ status: 401 }), ctx);
      expect(ctx.status).toBe(404);
    });

    it('should call the custom success handler before next', async () => {
      const calls: string[] = [];
      const onSuccess = vi.fn(() => {
        calls.push('onSuccess');
      });
      const middleware = createSharedKeyKoaMiddleware({
        secretResolver: resolveSecret,
        now,
        logger,
        onSuccess,
      });
      const ctx = createMockContext(signedRequest());
      const next = vi.fn(async () => {
        calls.push('next');
      });

      await middleware(ctx, next);

      expect(onSuccess).toHaveBeenCalledWith(expect.objectContaining({ account: 'alice' }), ctx);
      expect(calls).toEqual(['onSuccess', 'next']);
    });
  });
});
