/**
 * Credential strategies and the conventional order to try them in.
 */

import type { FetchLike } from '../../transport/http.js';
import { ambientStrategy, type AmbientStrategyOptions } from './ambient.js';
import { appDefaultStrategy, type AppDefaultStrategyOptions } from './app-default.js';
import { environmentTokenStrategy, type EnvironmentTokenOptions } from './environment-token.js';
import { explicitStrategy } from './explicit.js';
import { serviceAccountStrategy, type ServiceAccountStrategyOptions } from './service-account.js';
import type { CredentialStrategy } from './types.js';
import { userCacheStrategy, type UserCacheStrategyOptions } from './user-cache.js';

export * from './types.js';
export { acceptExternalToken, describeShape, explicitStrategy, type RequestConfig } from './explicit.js';
export {
  fetchServiceAccountToken,
  parseServiceAccountKey,
  serviceAccountStrategy,
  signServiceAccountAssertion,
  type ServiceAccountKey,
  type ServiceAccountStrategyOptions,
} from './service-account.js';
export {
  appDefaultStrategy,
  findApplicationCredentials,
  wellKnownCredentialsPath,
  type AppDefaultStrategyOptions,
} from './app-default.js';
export { environmentTokenStrategy, type EnvironmentTokenOptions } from './environment-token.js';
export {
  defaultOAuthCacheDir,
  grantFileName,
  readUserGrants,
  userCacheStrategy,
  writeUserGrant,
  type UserCacheStrategyOptions,
  type UserGrant,
} from './user-cache.js';
export {
  ambientStrategy,
  isMetadataServerAvailable,
  metadataBaseUrl,
  type AmbientStrategyOptions,
} from './ambient.js';

export interface DefaultStrategiesOptions {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  serviceAccount?: ServiceAccountStrategyOptions;
  appDefault?: AppDefaultStrategyOptions;
  environmentToken?: EnvironmentTokenOptions;
  userCache?: UserCacheStrategyOptions;
  ambient?: AmbientStrategyOptions;
}

/**
 * explicit, service-account, app-default, environment-token, user-cache, ambient.
 * A fresh list each call; callers may reorder or filter it.
 */
export function defaultStrategies(options: DefaultStrategiesOptions = {}): CredentialStrategy[] {
  const shared = { fetch: options.fetch };
  const env = options.env;
  return [
    explicitStrategy(),
    serviceAccountStrategy({ ...shared, ...options.serviceAccount }),
    appDefaultStrategy({ ...shared, env, ...options.appDefault }),
    environmentTokenStrategy({ env, ...options.environmentToken }),
    userCacheStrategy({ ...shared, ...options.userCache }),
    ambientStrategy({ ...shared, env, ...options.ambient }),
  ];
}
