/**
 * Application default credentials: the JSON file named by
 * GOOGLE_APPLICATION_CREDENTIALS, or the one `gcloud auth
 * application-default login` writes.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ENV_VARS, GOOGLE_OAUTH, PATHS } from '../../constants.js';
import { ConfigurationError } from '../../errors/types.js';
import { getLogger } from '../../logging/logger.js';
import { exchangeRefreshToken, type TokenEndpointOptions } from '../../oauth/token-endpoint.js';
import { GoogleToken } from '../../token/facade.js';
import { fetchServiceAccountToken, parseServiceAccountKey } from './service-account.js';
import { failure, notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:app-default');

const authorizedUserSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

type AuthorizedUser = z.infer<typeof authorizedUserSchema>;

export interface AppDefaultStrategyOptions extends TokenEndpointOptions {
  env?: NodeJS.ProcessEnv;
  /** Home directory, for locating gcloud's well-known file */
  home?: string;
  platform?: NodeJS.Platform;
}

/**
 * Where gcloud keeps application default credentials on this platform.
 */
export function wellKnownCredentialsPath(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
  platform: NodeJS.Platform = process.platform
): string {
  if (platform === 'win32' && env.APPDATA) {
    return join(env.APPDATA, 'gcloud', PATHS.GCLOUD_ADC_FILE);
  }
  return join(home, '.config', 'gcloud', PATHS.GCLOUD_ADC_FILE);
}

/**
 * Locate the credentials file, or undefined when there is none.
 */
export function findApplicationCredentials(options: AppDefaultStrategyOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const explicit = env[ENV_VARS.APPLICATION_CREDENTIALS];
  if (explicit) {
    return explicit;
  }
  const wellKnown = wellKnownCredentialsPath(env, options.home, options.platform);
  return existsSync(wellKnown) ? wellKnown : undefined;
}

async function fetchAuthorizedUserToken(
  user: AuthorizedUser,
  scopes: readonly string[],
  options: TokenEndpointOptions
): Promise<GoogleToken> {
  const grant = await exchangeRefreshToken(
    { clientId: user.client_id, clientSecret: user.client_secret, refreshToken: user.refresh_token },
    options
  );
  return new GoogleToken({
    accessToken: grant.access_token,
    refreshToken: user.refresh_token,
    expiresIn: grant.expires_in,
    scopes: grant.scope ? grant.scope.split(/\s+/) : scopes,
    source: 'app-default',
    refresher: () => fetchAuthorizedUserToken(user, scopes, options),
  });
}

export function appDefaultStrategy(options: AppDefaultStrategyOptions = {}): CredentialStrategy {
  return {
    name: 'app-default',
    async attempt(context) {
      const path = findApplicationCredentials(options);
      if (!path) {
        return notApplicable(`${ENV_VARS.APPLICATION_CREDENTIALS} is unset and no gcloud credentials file exists`);
      }

      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
      } catch (error) {
        return failure(
          new ConfigurationError(
            `Application default credentials at ${path} are unreadable or not JSON`,
            { strategy: 'app-default', metadata: { path } },
            error instanceof Error ? error : undefined
          )
        );
      }

      const type = typeof raw === 'object' && raw !== null && 'type' in raw ? raw.type : undefined;
      const scopes = context.scopes.length ? context.scopes : [GOOGLE_OAUTH.CLOUD_PLATFORM_SCOPE];

      try {
        if (type === 'service_account') {
          const key = parseServiceAccountKey(raw, `File ${path}`);
          log().debug({ path, account: key.client_email }, 'Using service account from application default credentials');
          return success(await fetchServiceAccountToken(key, scopes, { ...options, source: 'app-default' }));
        }

        if (type === 'authorized_user') {
          const parsed = authorizedUserSchema.safeParse(raw);
          if (!parsed.success) {
            return failure(
              new ConfigurationError(`Authorized user credentials at ${path} are incomplete`, {
                strategy: 'app-default',
                metadata: { path },
              })
            );
          }
          log().debug({ path }, 'Using authorized user from application default credentials');
          return success(await fetchAuthorizedUserToken(parsed.data, scopes, options));
        }
      } catch (error) {
        return failure(error);
      }

      return failure(
        new ConfigurationError(`Unsupported application default credentials type "${String(type)}" in ${path}`, {
          strategy: 'app-default',
          metadata: { path },
        })
      );
    },
  };
}
