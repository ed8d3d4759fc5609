/**
 * Access token handed in through an environment variable, e.g. by a CI
 * job that minted it with workload identity.
 */

import { ENV_VARS } from '../../constants.js';
import { getLogger, maskSecret } from '../../logging/logger.js';
import { GoogleToken } from '../../token/facade.js';
import { notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:environment-token');

export interface EnvironmentTokenOptions {
  /** Variable holding the token (default: GOOGLE_OAUTH_ACCESS_TOKEN) */
  envVar?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * The token cannot be refreshed; its scopes are assumed to be the ones
 * requested, and introspection reveals the real grant.
 */
export function environmentTokenStrategy(options: EnvironmentTokenOptions = {}): CredentialStrategy {
  const envVar = options.envVar ?? ENV_VARS.ACCESS_TOKEN;

  return {
    name: 'environment-token',
    async attempt(context) {
      const env = options.env ?? process.env;
      const value = env[envVar]?.trim();
      if (!value) {
        return notApplicable(`${envVar} is not set`);
      }
      log().debug({ envVar, token: maskSecret(value) }, 'Using token from environment');
      return success(
        new GoogleToken({
          accessToken: value,
          scopes: context.scopes,
          source: 'environment-token',
        })
      );
    },
  };
}
