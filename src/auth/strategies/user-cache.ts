/**
 * Cached user OAuth grants.
 *
 * An external OAuth flow writes one JSON file per grant into the cache
 * directory; this strategy picks the grant matching the client, the account
 * email and the requested scopes, refreshing it when expired.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { PATHS } from '../../constants.js';
import { getLogger } from '../../logging/logger.js';
import { exchangeRefreshToken, type TokenEndpointOptions } from '../../oauth/token-endpoint.js';
import { GoogleToken, type TokenRefresher } from '../../token/facade.js';
import type { OAuthClientIdentity } from '../client.js';
import { failure, notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:user-cache');

export const userGrantSchema = z.object({
  email: z.string().min(1),
  clientId: z.string().min(1),
  scopes: z.array(z.string()),
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  /** ISO timestamp */
  expiry: z.string().datetime({ offset: true }).optional(),
});

export type UserGrant = z.infer<typeof userGrantSchema>;

interface CachedGrant {
  file: string;
  grant: UserGrant;
}

export function defaultOAuthCacheDir(home: string = homedir()): string {
  return join(home, PATHS.OAUTH_CACHE_DIR);
}

/**
 * File name for a grant: a short hash of client and scopes, then the email.
 */
export function grantFileName(grant: Pick<UserGrant, 'clientId' | 'scopes' | 'email'>): string {
  const hash = createHash('sha256')
    .update(grant.clientId)
    .update('\n')
    .update([...grant.scopes].sort().join(' '))
    .digest('hex')
    .slice(0, 16);
  return `${hash}_${grant.email}`;
}

/**
 * Write a grant into the cache. Returns the file path.
 */
export function writeUserGrant(cacheDir: string, grant: UserGrant): string {
  const valid = userGrantSchema.parse(grant);
  if (!existsSync(cacheDir)) {
    mkdirSync(cacheDir, { recursive: true, mode: 0o700 });
  }
  const file = join(cacheDir, grantFileName(valid));
  writeFileSync(file, JSON.stringify(valid, null, 2), { mode: 0o600 });
  return file;
}

/**
 * Read every valid grant in the cache directory; invalid files are skipped.
 */
export function readUserGrants(cacheDir: string): CachedGrant[] {
  if (!existsSync(cacheDir)) {
    return [];
  }
  const grants: CachedGrant[] = [];
  for (const name of readdirSync(cacheDir)) {
    const file = join(cacheDir, name);
    try {
      const parsed = userGrantSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
      if (parsed.success) {
        grants.push({ file, grant: parsed.data });
      } else {
        log().debug({ file }, 'Skipping cache entry that is not a user grant');
      }
    } catch (error) {
      log().debug({ file, error: error instanceof Error ? error.message : String(error) }, 'Skipping unreadable cache entry');
    }
  }
  return grants;
}

export interface UserCacheStrategyOptions extends TokenEndpointOptions {
  cacheDir?: string;
  /** Default email when the request carries no hint */
  email?: string;
  now?: () => number;
}

function tokenFromGrant(
  grant: UserGrant,
  client: OAuthClientIdentity | undefined,
  cacheDir: string,
  options: UserCacheStrategyOptions
): GoogleToken {
  let refresher: TokenRefresher | undefined;
  if (grant.refreshToken !== undefined && client !== undefined) {
    const owner = client;
    refresher = () => refreshGrant(grant, owner, cacheDir, options);
  }
  return new GoogleToken({
    accessToken: grant.accessToken,
    refreshToken: grant.refreshToken,
    expiry: grant.expiry ? new Date(grant.expiry) : undefined,
    scopes: grant.scopes,
    source: 'user-cache',
    now: options.now,
    refresher,
  });
}

async function refreshGrant(
  grant: UserGrant,
  client: OAuthClientIdentity,
  cacheDir: string,
  options: UserCacheStrategyOptions
): Promise<GoogleToken> {
  if (!grant.refreshToken) {
    throw new Error(`Cached grant for ${grant.email} has no refresh token`);
  }
  const response = await exchangeRefreshToken(
    { clientId: client.id, clientSecret: client.secret, refreshToken: grant.refreshToken },
    options
  );
  const now = (options.now ?? Date.now)();
  const refreshed: UserGrant = {
    ...grant,
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? grant.refreshToken,
    expiry: response.expires_in !== undefined ? new Date(now + response.expires_in * 1000).toISOString() : undefined,
  };
  writeUserGrant(cacheDir, refreshed);
  log().debug({ email: grant.email }, 'Refreshed cached user grant');
  return tokenFromGrant(refreshed, client, cacheDir, options);
}

export function userCacheStrategy(options: UserCacheStrategyOptions = {}): CredentialStrategy {
  return {
    name: 'user-cache',
    async attempt(context) {
      const cacheDir = options.cacheDir ?? defaultOAuthCacheDir();
      const email = context.hints?.email ?? options.email;
      const client = context.client;

      const candidates = readUserGrants(cacheDir).filter(({ grant }) => {
        if (client && grant.clientId !== client.id) return false;
        if (email && email !== '*' && grant.email !== email) return false;
        const granted = new Set(grant.scopes);
        return context.scopes.every((s) => granted.has(s));
      });

      if (candidates.length === 0) {
        return notApplicable(
          email && email !== '*'
            ? `no cached grant for ${email} covers the requested scopes`
            : `no cached grant in ${cacheDir} covers the requested scopes`
        );
      }
      if (candidates.length > 1 && (!email || email === '*')) {
        const emails = candidates.map((c) => c.grant.email).join(', ');
        return notApplicable(`several cached grants match (${emails}); pass an email hint to choose one`);
      }

      const [{ grant }] = candidates;
      const token = tokenFromGrant(grant, client, cacheDir, options);
      if (!token.isExpired()) {
        log().debug({ email: grant.email }, 'Using cached user grant');
        return success(token);
      }

      if (!grant.refreshToken || !client) {
        return notApplicable(`cached grant for ${grant.email} has expired and cannot be refreshed`);
      }
      try {
        return success(await refreshGrant(grant, client, cacheDir, options));
      } catch (error) {
        return failure(error);
      }
    },
  };
}
