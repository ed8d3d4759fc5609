/**
 * Service-account key strategy: sign a JWT with the key's private key and
 * trade it for an access token.
 */

import { createSign } from 'crypto';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { GOOGLE_OAUTH, TIMEOUTS } from '../../constants.js';
import { ConfigurationError } from '../../errors/types.js';
import { getLogger } from '../../logging/logger.js';
import { exchangeJwtAssertion, type TokenEndpointOptions } from '../../oauth/token-endpoint.js';
import { GoogleToken } from '../../token/facade.js';
import { failure, notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:service-account');

export const serviceAccountKeySchema = z.object({
  type: z.literal('service_account'),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  private_key_id: z.string().optional(),
  project_id: z.string().optional(),
  token_uri: z.string().url().optional(),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

/**
 * Parse and validate service-account key material.
 *
 * @throws ConfigurationError when the JSON is malformed or not a service-account key
 */
export function parseServiceAccountKey(source: unknown, label = 'service account key'): ServiceAccountKey {
  let raw: unknown = source;
  if (typeof source === 'string') {
    try {
      raw = JSON.parse(source);
    } catch (error) {
      throw new ConfigurationError(
        `${label} is not valid JSON`,
        { operation: 'parseServiceAccountKey' },
        error instanceof Error ? error : undefined
      );
    }
  }

  const parsed = serviceAccountKeySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`${label} is not a service account key (${issues.join('; ')})`, {
      operation: 'parseServiceAccountKey',
    });
  }
  return parsed.data;
}

function base64url(input: string | Buffer): string {
  return Buffer.from(input).toString('base64url');
}

export interface AssertionOptions {
  /** User to impersonate with domain-wide delegation */
  subject?: string;
  /** Issued-at, in seconds since the epoch (for tests) */
  issuedAt?: number;
}

/**
 * Build an RS256-signed JWT assertion for the jwt-bearer grant.
 */
export function signServiceAccountAssertion(
  key: ServiceAccountKey,
  scopes: readonly string[],
  options: AssertionOptions = {}
): string {
  const iat = options.issuedAt ?? Math.floor(Date.now() / 1000);
  const header = { alg: 'RS256', typ: 'JWT', ...(key.private_key_id ? { kid: key.private_key_id } : {}) };
  const claims = {
    iss: key.client_email,
    scope: scopes.join(' '),
    aud: key.token_uri ?? GOOGLE_OAUTH.TOKEN_URI,
    iat,
    exp: iat + TIMEOUTS.JWT_LIFETIME_SECONDS,
    ...(options.subject ? { sub: options.subject } : {}),
  };

  const signingInput = `${base64url(JSON.stringify(header))}.${base64url(JSON.stringify(claims))}`;
  const signer = createSign('RSA-SHA256');
  signer.update(signingInput);
  signer.end();
  try {
    return `${signingInput}.${signer.sign(key.private_key, 'base64url')}`;
  } catch (error) {
    throw new ConfigurationError(
      `Private key for ${key.client_email} could not sign an assertion`,
      { operation: 'signServiceAccountAssertion' },
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Obtain a token for a service account. The token refreshes by signing a new assertion.
 */
export async function fetchServiceAccountToken(
  key: ServiceAccountKey,
  scopes: readonly string[],
  options: TokenEndpointOptions & { subject?: string; source?: string } = {}
): Promise<GoogleToken> {
  const assertion = signServiceAccountAssertion(key, scopes, { subject: options.subject });
  const grant = await exchangeJwtAssertion(assertion, { ...options, tokenUri: key.token_uri ?? options.tokenUri });

  return new GoogleToken({
    accessToken: grant.access_token,
    expiresIn: grant.expires_in,
    scopes: grant.scope ? grant.scope.split(/\s+/) : scopes,
    source: options.source ?? 'service-account',
    refresher: () => fetchServiceAccountToken(key, scopes, options),
  });
}

export interface ServiceAccountStrategyOptions extends TokenEndpointOptions {
  /** Key file path; overridden by the path hint */
  path?: string;
  /** Key material, already read */
  json?: string | object;
  subject?: string;
}

export function serviceAccountStrategy(options: ServiceAccountStrategyOptions = {}): CredentialStrategy {
  return {
    name: 'service-account',
    async attempt(context) {
      const path = context.hints?.path ?? options.path;
      let source: string | object;
      let label: string;

      if (path !== undefined) {
        try {
          source = readFileSync(path, 'utf-8');
        } catch (error) {
          return failure(
            new ConfigurationError(
              `Cannot read service account key file ${path}`,
              { strategy: 'service-account', metadata: { path } },
              error instanceof Error ? error : undefined
            )
          );
        }
        label = `File ${path}`;
      } else if (options.json !== undefined) {
        source = options.json;
        label = 'Service account JSON';
      } else {
        return notApplicable('no service account key path or JSON was supplied');
      }

      try {
        const key = parseServiceAccountKey(source, label);
        const scopes = context.scopes.length ? context.scopes : [GOOGLE_OAUTH.CLOUD_PLATFORM_SCOPE];
        const token = await fetchServiceAccountToken(key, scopes, { ...options, subject: options.subject });
        log().debug({ account: key.client_email }, 'Obtained service account token');
        return success(token);
      } catch (error) {
        return failure(error);
      }
    },
  };
}
