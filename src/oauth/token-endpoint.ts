/**
 * Non-interactive grants against an OAuth token endpoint: JWT bearer
 * assertions for service accounts and refresh-token exchanges.
 */

import { z } from 'zod';
import { GOOGLE_OAUTH, TIMEOUTS } from '../constants.js';
import { TokenExchangeError } from '../errors/types.js';
import { TOKEN_EXCHANGE_RETRY_OPTIONS, withRetry, type RetryOptions } from '../errors/retry.js';
import {
  describeErrorBody,
  fetchJson,
  resolveFetch,
  validateSecureUrl,
  type FetchLike,
  type HttpResponse,
} from '../transport/http.js';

const grantResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  refresh_token: z.string().optional(),
  token_type: z.string().optional(),
});

export type GrantResponse = z.infer<typeof grantResponseSchema>;

export interface TokenEndpointOptions {
  tokenUri?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  retry?: RetryOptions;
}

/**
 * POST a grant and parse the token response.
 */
export async function requestGrant(
  form: Record<string, string>,
  options: TokenEndpointOptions = {}
): Promise<GrantResponse> {
  const tokenUri = options.tokenUri ?? GOOGLE_OAUTH.TOKEN_URI;
  validateSecureUrl(tokenUri);
  const fetchImpl = resolveFetch(options.fetch);

  return withRetry(
    async () => {
      let response: HttpResponse;
      try {
        response = await fetchJson(fetchImpl, tokenUri, {
          method: 'POST',
          form,
          timeoutMs: options.timeoutMs ?? TIMEOUTS.DEFAULT,
        });
      } catch (error) {
        throw new TokenExchangeError(
          `Token endpoint unreachable: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error : undefined, context: { operation: form.grant_type } }
        );
      }

      if (!response.ok) {
        const { error, description } = describeErrorBody(response);
        throw new TokenExchangeError(`Token exchange failed: ${description}`, {
          status: response.status,
          oauthError: error,
          context: { operation: form.grant_type },
        });
      }

      const parsed = grantResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new TokenExchangeError('Token endpoint returned no access_token', {
          status: response.status,
          context: { operation: form.grant_type },
        });
      }
      return parsed.data;
    },
    { ...TOKEN_EXCHANGE_RETRY_OPTIONS, ...options.retry }
  );
}

export function exchangeJwtAssertion(assertion: string, options: TokenEndpointOptions = {}): Promise<GrantResponse> {
  return requestGrant({ grant_type: GOOGLE_OAUTH.JWT_BEARER_GRANT, assertion }, options);
}

export interface RefreshGrantInput {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export function exchangeRefreshToken(
  input: RefreshGrantInput,
  options: TokenEndpointOptions = {}
): Promise<GrantResponse> {
  return requestGrant(
    {
      grant_type: 'refresh_token',
      client_id: input.clientId,
      client_secret: input.clientSecret,
      refresh_token: input.refreshToken,
    },
    options
  );
}
