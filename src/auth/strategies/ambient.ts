/**
 * Ambient host credentials from the compute metadata server (GCE, Cloud Run,
 * GKE with workload identity).
 */

import { z } from 'zod';
import { ENV_VARS, METADATA_SERVER, TIMEOUTS } from '../../constants.js';
import { TokenExchangeError } from '../../errors/types.js';
import { getLogger } from '../../logging/logger.js';
import { GoogleToken } from '../../token/facade.js';
import { fetchJson, resolveFetch, type FetchLike } from '../../transport/http.js';
import { failure, notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:ambient');

const metadataTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

export interface AmbientStrategyOptions {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  /** Service account on the instance (default: 'default') */
  account?: string;
  /** Set false to skip the metadata server entirely */
  enabled?: boolean;
  probeTimeoutMs?: number;
  timeoutMs?: number;
}

export function metadataBaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const host = env[ENV_VARS.METADATA_HOST] || METADATA_SERVER.DEFAULT_HOST;
  return `http://${host}/computeMetadata/v1`;
}

/**
 * True when the metadata server answers with the expected flavor header.
 */
export async function isMetadataServerAvailable(options: AmbientStrategyOptions = {}): Promise<boolean> {
  const fetchImpl = resolveFetch(options.fetch);
  try {
    const response = await fetchJson(fetchImpl, `${metadataBaseUrl(options.env)}/`, {
      headers: { [METADATA_SERVER.FLAVOR_HEADER]: METADATA_SERVER.FLAVOR_VALUE },
      timeoutMs: options.probeTimeoutMs ?? TIMEOUTS.METADATA_PROBE,
    });
    return response.headers.get(METADATA_SERVER.FLAVOR_HEADER) === METADATA_SERVER.FLAVOR_VALUE;
  } catch (error) {
    log().debug({ error: error instanceof Error ? error.message : String(error) }, 'Metadata server probe failed');
    return false;
  }
}

async function fetchMetadataToken(
  fetchImpl: FetchLike,
  scopes: readonly string[],
  options: AmbientStrategyOptions
): Promise<GoogleToken> {
  const account = options.account ?? METADATA_SERVER.DEFAULT_ACCOUNT;
  const url = new URL(`${metadataBaseUrl(options.env)}/instance/service-accounts/${encodeURIComponent(account)}/token`);
  if (scopes.length) {
    url.searchParams.set('scopes', scopes.join(','));
  }

  const response = await fetchJson(fetchImpl, url.toString(), {
    headers: { [METADATA_SERVER.FLAVOR_HEADER]: METADATA_SERVER.FLAVOR_VALUE },
    timeoutMs: options.timeoutMs ?? TIMEOUTS.DEFAULT,
  });
  if (!response.ok) {
    throw new TokenExchangeError(`Metadata server refused a token for ${account}: HTTP ${response.status}`, {
      status: response.status,
      context: { strategy: 'ambient' },
    });
  }
  const parsed = metadataTokenSchema.safeParse(response.body);
  if (!parsed.success) {
    throw new TokenExchangeError('Metadata server returned no access_token', {
      status: response.status,
      context: { strategy: 'ambient' },
    });
  }

  return new GoogleToken({
    accessToken: parsed.data.access_token,
    expiresIn: parsed.data.expires_in,
    scopes,
    source: 'ambient',
    refresher: () => fetchMetadataToken(fetchImpl, scopes, options),
  });
}

export function ambientStrategy(options: AmbientStrategyOptions = {}): CredentialStrategy {
  return {
    name: 'ambient',
    async attempt(context) {
      if (options.enabled === false) {
        return notApplicable('metadata server lookup is disabled');
      }
      if (!(await isMetadataServerAvailable(options))) {
        return notApplicable('no metadata server detected');
      }
      try {
        const token = await fetchMetadataToken(resolveFetch(options.fetch), context.scopes, options);
        log().debug('Obtained token from metadata server');
        return success(token);
      } catch (error) {
        return failure(error);
      }
    },
  };
}
