import { describe, it, expect } from 'vitest';
import { TokenIntrospector, parseScopeClaim } from '../../src/token/introspection.js';
import { IntrospectionError, InvalidTokenError } from '../../src/errors/types.js';
import { fakeFetch, jsonResponse, requestHeaders, requestUrl } from '../fixtures/http.js';
import { googleToken } from '../fixtures/tokens.js';

const SA_EMAIL = 'robot@test-project.iam.gserviceaccount.com';
const DRIVE = 'https://www.googleapis.com/auth/drive';
const EMAIL_SCOPE = 'https://www.googleapis.com/auth/userinfo.email';

function tokenInfoBody(overrides: Record<string, unknown> = {}) {
  return {
    azp: '1234567890',
    aud: '1234567890',
    scope: `${DRIVE} ${EMAIL_SCOPE}`,
    exp: '1893456000',
    expires_in: '3599',
    email: SA_EMAIL,
    email_verified: 'true',
    ...overrides,
  };
}

describe('token/introspection', () => {
  describe('tokenInfo', () => {
    it('should query tokeninfo with the token as parameter and bearer header', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody()));
      const introspector = new TokenIntrospector({ fetch });

      const info = await introspector.tokenInfo(googleToken());

      expect(requestUrl(fetch).toString()).toBe(
        'https://oauth2.googleapis.com/tokeninfo?access_token=test-access-token'
      );
      expect(requestHeaders(fetch).authorization).toBe('Bearer test-access-token');
      expect(requestHeaders(fetch).accept).toBe('application/json');
      expect(info.email).toBe(SA_EMAIL);
      expect([...info.scope]).toEqual([DRIVE, EMAIL_SCOPE]);
      expect(info.expiresIn).toBe(3599);
    });

    it('should cache the result on the token', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody()));
      const introspector = new TokenIntrospector({ fetch });
      const token = googleToken();

      const first = await introspector.tokenInfo(token);
      const second = await introspector.tokenInfo(token);

      expect(second).toBe(first);
      expect(token.cachedIntrospection).toBe(first);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should reject a revoked token without caching', async () => {
      const fetch = fakeFetch(jsonResponse({ error: 'invalid_token', error_description: 'Invalid Value' }, 400));
      const introspector = new TokenIntrospector({ fetch });
      const token = googleToken();

      const error = await introspector.tokenInfo(token).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidTokenError);
      if (error instanceof InvalidTokenError) {
        expect(error.status).toBe(400);
        expect(error.message).toBe('Token rejected by introspection endpoint: invalid_token: Invalid Value');
      }
      expect(token.cachedIntrospection).toBeUndefined();
    });

    it('should leave the cache empty when an overlapping lookup is rejected', async () => {
      const fetch = fakeFetch(jsonResponse({ error: 'invalid_token' }, 400), jsonResponse(tokenInfoBody()));
      const introspector = new TokenIntrospector({ fetch });
      const token = googleToken();

      const results = await Promise.allSettled([introspector.tokenInfo(token), introspector.scopes(token)]);

      expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
      expect(fetch).toHaveBeenCalledTimes(1);
      expect(token.cachedIntrospection).toBeUndefined();

      const info = await introspector.tokenInfo(token);
      expect(info.email).toBe(SA_EMAIL);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should treat a 401 as an invalid token', async () => {
      const fetch = fakeFetch(new Response('', { status: 401 }));

      await expect(new TokenIntrospector({ fetch }).tokenInfo(googleToken())).rejects.toThrow(
        'Token rejected by introspection endpoint: HTTP 401'
      );
    });

    it('should report server errors as retryable introspection failures', async () => {
      const fetch = fakeFetch(new Response('unavailable', { status: 503 }));
      const token = googleToken();

      const error = await new TokenIntrospector({ fetch }).tokenInfo(token).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IntrospectionError);
      if (error instanceof IntrospectionError) {
        expect(error.status).toBe(503);
        expect(error.retryable).toBe('retryable');
        expect(error.message).toBe('Token introspection failed: HTTP 503');
      }
      expect(token.cachedIntrospection).toBeUndefined();
    });

    it('should report transport failures', async () => {
      const fetch = fakeFetch(new TypeError('fetch failed'));

      await expect(new TokenIntrospector({ fetch }).tokenInfo(googleToken())).rejects.toThrow(
        'Token introspection failed: Request to oauth2.googleapis.com failed: fetch failed'
      );
    });

    it('should reject a malformed body', async () => {
      const fetch = fakeFetch(jsonResponse({ scope: 42 }));

      await expect(new TokenIntrospector({ fetch }).tokenInfo(googleToken())).rejects.toThrow(IntrospectionError);
    });

    it('should refuse a plain HTTP endpoint', () => {
      expect(() => new TokenIntrospector({ endpoint: 'http://tokeninfo.example.com/' })).toThrow(
        'Insecure URL rejected: http://tokeninfo.example.com/. Token traffic must use HTTPS.'
      );
    });
  });

  describe('email', () => {
    it('should share one round trip with tokenInfo', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody()));
      const introspector = new TokenIntrospector({ fetch });
      const token = googleToken();

      const email = await introspector.email(token);
      const info = await introspector.tokenInfo(token);

      expect(email).toMatch(/^robot@test-project[.]iam[.]gserviceaccount[.]com$/);
      expect(email).toBe(info.email);
      expect(info.scope.has(EMAIL_SCOPE)).toBe(true);
      expect(info.scope.has(DRIVE)).toBe(true);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should share one round trip when called alongside tokenInfo', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody()));
      const introspector = new TokenIntrospector({ fetch });
      const token = googleToken();

      const [email, info] = await Promise.all([introspector.email(token), introspector.tokenInfo(token)]);

      expect(email).toBe(SA_EMAIL);
      expect(info.email).toBe(email);
      expect(token.cachedIntrospection).toBe(info);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should explain a missing email scope', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody({ email: undefined, scope: DRIVE })));

      await expect(new TokenIntrospector({ fetch }).email(googleToken())).rejects.toThrow(
        `Token info carries no email; request the ${EMAIL_SCOPE} scope`
      );
    });
  });

  describe('scopes', () => {
    it('should return the granted scopes', async () => {
      const fetch = fakeFetch(jsonResponse(tokenInfoBody({ scope: [DRIVE] })));

      const scopes = await new TokenIntrospector({ fetch }).scopes(googleToken());

      expect([...scopes]).toEqual([DRIVE]);
    });
  });

  it('should split scope claims on whitespace', () => {
    expect([...parseScopeClaim('  a b\tc  ')]).toEqual(['a', 'b', 'c']);
    expect([...parseScopeClaim(['a', '', 'b'])]).toEqual(['a', 'b']);
  });
});
