import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createVerify } from 'crypto';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  fetchServiceAccountToken,
  parseServiceAccountKey,
  serviceAccountStrategy,
  signServiceAccountAssertion,
} from '../../src/auth/strategies/service-account.js';
import { ConfigurationError, TokenExchangeError } from '../../src/errors/types.js';
import { GoogleToken } from '../../src/token/facade.js';
import { fakeFetch, jsonResponse, requestForm, requestUrl } from '../fixtures/http.js';
import { decodeClaims, serviceAccountKey, TEST_PUBLIC_KEY } from '../fixtures/keys.js';

const DRIVE = 'https://www.googleapis.com/auth/drive';
const JWT_BEARER = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

describe('auth/strategies/service-account', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `authbroker-sa-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('parseServiceAccountKey', () => {
    it('should parse key JSON text', () => {
      const key = parseServiceAccountKey(JSON.stringify(serviceAccountKey()));

      expect(key.client_email).toBe('robot@test-project.iam.gserviceaccount.com');
    });

    it('should reject text that is not JSON', () => {
      expect(() => parseServiceAccountKey('not json', 'File key.json')).toThrow('File key.json is not valid JSON');
    });

    it('should reject other credential types', () => {
      expect(() => parseServiceAccountKey({ type: 'authorized_user', client_id: 'x' })).toThrow(ConfigurationError);
    });
  });

  describe('signServiceAccountAssertion', () => {
    it('should produce an RS256 JWT the public key verifies', () => {
      const jwt = signServiceAccountAssertion(serviceAccountKey(), [DRIVE], { issuedAt: 1700000000 });
      const [header, payload, signature] = jwt.split('.');

      const verifier = createVerify('RSA-SHA256');
      verifier.update(`${header}.${payload}`);
      expect(verifier.verify(TEST_PUBLIC_KEY, signature, 'base64url')).toBe(true);

      expect(JSON.parse(Buffer.from(header, 'base64url').toString('utf8'))).toEqual({
        alg: 'RS256',
        typ: 'JWT',
        kid: 'test-key-id',
      });
      expect(decodeClaims(jwt)).toEqual({
        iss: 'robot@test-project.iam.gserviceaccount.com',
        scope: DRIVE,
        aud: 'https://oauth2.googleapis.com/token',
        iat: 1700000000,
        exp: 1700003600,
      });
    });

    it('should join scopes with spaces and add the delegated subject', () => {
      const jwt = signServiceAccountAssertion(serviceAccountKey(), ['a', 'b'], {
        issuedAt: 1700000000,
        subject: 'someone@example.com',
      });

      const claims = decodeClaims(jwt);
      expect(claims.scope).toBe('a b');
      expect(claims.sub).toBe('someone@example.com');
    });

    it('should use the token_uri of the key as audience', () => {
      const key = serviceAccountKey({ token_uri: 'https://tokens.example.com/token' });

      expect(decodeClaims(signServiceAccountAssertion(key, [DRIVE])).aud).toBe('https://tokens.example.com/token');
    });

    it('should fail with a ConfigurationError on an unusable private key', () => {
      const key = serviceAccountKey({ private_key: 'not a pem' });

      expect(() => signServiceAccountAssertion(key, [DRIVE])).toThrow(ConfigurationError);
    });
  });

  describe('fetchServiceAccountToken', () => {
    it('should exchange the assertion for a token', async () => {
      const fetch = fakeFetch(jsonResponse({ access_token: 'sa-access-token', expires_in: 3599, token_type: 'Bearer' }));

      const token = await fetchServiceAccountToken(serviceAccountKey(), [DRIVE], { fetch });

      expect(token).toBeInstanceOf(GoogleToken);
      expect(token.accessToken).toBe('sa-access-token');
      expect([...token.scopes]).toEqual([DRIVE]);
      expect(token.source).toBe('service-account');
      expect(token.canRefresh).toBe(true);
      expect(requestUrl(fetch).toString()).toBe('https://oauth2.googleapis.com/token');
      const form = requestForm(fetch);
      expect(form.grant_type).toBe(JWT_BEARER);
      expect(decodeClaims(form.assertion).iss).toBe('robot@test-project.iam.gserviceaccount.com');
    });

    it('should refresh by signing a new assertion', async () => {
      const fetch = fakeFetch(
        jsonResponse({ access_token: 'first-token', expires_in: 3599 }),
        jsonResponse({ access_token: 'second-token', expires_in: 3599 })
      );

      const token = await fetchServiceAccountToken(serviceAccountKey(), [DRIVE], { fetch });
      const refreshed = await token.refresh();

      expect(refreshed.accessToken).toBe('second-token');
      expect(token.accessToken).toBe('first-token');
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should surface an invalid_grant answer without retrying', async () => {
      const fetch = fakeFetch(
        jsonResponse({ error: 'invalid_grant', error_description: 'Invalid JWT Signature.' }, 400)
      );

      const error = await fetchServiceAccountToken(serviceAccountKey(), [DRIVE], { fetch }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TokenExchangeError);
      if (error instanceof TokenExchangeError) {
        expect(error.message).toBe('Token exchange failed: invalid_grant: Invalid JWT Signature.');
        expect(error.status).toBe(400);
        expect(error.oauthError).toBe('invalid_grant');
        expect(error.retryable).toBe('terminal');
      }
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('serviceAccountStrategy', () => {
    it('should not apply without a path or JSON', async () => {
      const outcome = await serviceAccountStrategy().attempt({ scopes: [DRIVE] });

      expect(outcome).toEqual({
        kind: 'not-applicable',
        reason: 'no service account key path or JSON was supplied',
      });
    });

    it('should obtain a token from a key file named in the hints', async () => {
      const path = join(testDir, 'key.json');
      writeFileSync(path, JSON.stringify(serviceAccountKey()));
      const fetch = fakeFetch(jsonResponse({ access_token: 'sa-access-token', expires_in: 3599 }));

      const outcome = await serviceAccountStrategy({ fetch }).attempt({ scopes: [DRIVE], hints: { path } });

      expect(outcome.kind).toBe('success');
      if (outcome.kind === 'success') {
        expect(outcome.token.accessToken).toBe('sa-access-token');
      }
    });

    it('should fail on a missing key file', async () => {
      const path = join(testDir, 'missing.json');

      const outcome = await serviceAccountStrategy().attempt({ scopes: [DRIVE], hints: { path } });

      expect(outcome.kind).toBe('failure');
      if (outcome.kind === 'failure') {
        expect(outcome.error).toBeInstanceOf(ConfigurationError);
        expect(outcome.error.message).toBe(`Cannot read service account key file ${path}`);
      }
    });

    it('should fail on a file that is not JSON', async () => {
      const path = join(testDir, 'key.json');
      writeFileSync(path, 'garbage');

      const outcome = await serviceAccountStrategy().attempt({ scopes: [DRIVE], hints: { path } });

      expect(outcome.kind).toBe('failure');
      if (outcome.kind === 'failure') {
        expect(outcome.error.message).toBe(`File ${path} is not valid JSON`);
      }
    });

    it('should request cloud-platform when no scopes are given', async () => {
      const fetch = fakeFetch(jsonResponse({ access_token: 'sa-access-token' }));

      await serviceAccountStrategy({ fetch, json: serviceAccountKey() }).attempt({ scopes: [] });

      expect(decodeClaims(requestForm(fetch).assertion).scope).toBe('https://www.googleapis.com/auth/cloud-platform');
    });
  });
});
