import { describe, it, expect, vi } from 'vitest';
import {
  cacheIntrospection,
  createIntrospectionResult,
  GoogleToken,
  isTokenFacade,
  type TokenFacade,
} from '../../src/token/facade.js';
import { BrokerError } from '../../src/errors/types.js';
import { googleToken } from '../fixtures/tokens.js';

const NOW = Date.parse('2029-06-01T00:00:00.000Z');

describe('token/facade', () => {
  describe('GoogleToken', () => {
    it('should default to the Google authorization host', () => {
      expect(googleToken().endpointHost).toBe('accounts.google.com');
    });

    it('should compute expiry from expiresIn', () => {
      const token = new GoogleToken({ accessToken: 'x', expiresIn: 3600, now: () => NOW });

      expect(token.expiry?.toISOString()).toBe('2029-06-01T01:00:00.000Z');
    });

    it('should report expiry sixty seconds early', () => {
      let now = NOW;
      const token = new GoogleToken({ accessToken: 'x', expiresIn: 120, now: () => now });

      expect(token.isExpired()).toBe(false);
      now = NOW + 59_000;
      expect(token.isExpired()).toBe(false);
      now = NOW + 60_000;
      expect(token.isExpired()).toBe(true);
    });

    it('should never expire without an expiry', () => {
      expect(googleToken().isExpired()).toBe(false);
    });

    it('should refresh through the refresher and leave itself intact', async () => {
      const replacement = googleToken({ accessToken: 'fresh' });
      const refresher = vi.fn(async () => replacement);
      const token = googleToken({ accessToken: 'stale', refresher });

      await expect(token.refresh()).resolves.toBe(replacement);
      expect(refresher).toHaveBeenCalledWith(token);
      expect(token.accessToken).toBe('stale');
    });

    it('should reject refresh without a refresher', async () => {
      const error = await googleToken({ source: 'environment-token' })
        .refresh()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BrokerError);
      if (error instanceof BrokerError) {
        expect(error.code).toBe('TOKEN_NOT_REFRESHABLE');
      }
    });

    it('should keep token material out of JSON', () => {
      const json = JSON.stringify(googleToken({ accessToken: 'test-access-token', refreshToken: 'test-refresh-token' }));

      expect(JSON.parse(json)).toEqual({
        source: 'test',
        endpointHost: 'accounts.google.com',
        scopes: ['https://www.googleapis.com/auth/drive'],
        hasRefreshToken: true,
      });
    });
  });

  describe('cachedIntrospection', () => {
    it('should be write-once on GoogleToken', () => {
      const token = googleToken();
      const result = createIntrospectionResult({ scope: ['a'] });

      token.cachedIntrospection = result;

      expect(token.cachedIntrospection).toBe(result);
      expect(() => {
        token.cachedIntrospection = createIntrospectionResult({ scope: ['b'] });
      }).toThrow('Introspection result is already cached on this token');
      expect(token.cachedIntrospection).toBe(result);
    });

    it('should be write-once through cacheIntrospection on any token', () => {
      const token: TokenFacade = {
        accessToken: 'x',
        endpointHost: 'accounts.google.com',
        isExpired: () => false,
        refresh: async () => googleToken(),
      };
      cacheIntrospection(token, createIntrospectionResult({ scope: [] }));

      const error = (() => {
        try {
          cacheIntrospection(token, createIntrospectionResult({ scope: [] }));
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(BrokerError);
      if (error instanceof BrokerError) {
        expect(error.code).toBe('INTROSPECTION_ALREADY_CACHED');
      }
    });
  });

  it('should freeze introspection results', () => {
    const result = createIntrospectionResult({ email: 'dev@example.com', scope: ['a', 'a', 'b'] });

    expect(Object.isFrozen(result)).toBe(true);
    expect([...result.scope]).toEqual(['a', 'b']);
  });

  describe('isTokenFacade', () => {
    it('should check capabilities, not classes', () => {
      expect(isTokenFacade(googleToken())).toBe(true);
      expect(isTokenFacade({ accessToken: 'x', endpointHost: 'h', isExpired: () => false, refresh: () => undefined })).toBe(
        true
      );
      expect(isTokenFacade({ accessToken: 'x', endpointHost: 'h' })).toBe(false);
      expect(isTokenFacade('x')).toBe(false);
      expect(isTokenFacade(null)).toBe(false);
    });
  });
});
