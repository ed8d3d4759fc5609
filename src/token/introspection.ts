/**
 * Token introspection against Google's tokeninfo endpoint.
 *
 * The result is memoized on the token itself, so asking for the email and
 * then for the full token info costs a single round trip.
 */

import { z } from 'zod';
import { GOOGLE_OAUTH, TIMEOUTS } from '../constants.js';
import { IntrospectionError, InvalidTokenError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import {
  describeErrorBody,
  fetchJson,
  resolveFetch,
  TransportFailure,
  validateSecureUrl,
  type FetchLike,
  type HttpResponse,
} from '../transport/http.js';
import {
  cacheIntrospection,
  createIntrospectionResult,
  type IntrospectionResult,
  type TokenFacade,
} from './facade.js';

const log = () => getLogger('introspection');

/**
 * Lookups under way, so overlapping calls on one token share a round trip.
 */
const inFlight = new WeakMap<TokenFacade, Promise<IntrospectionResult>>();

/**
 * tokeninfo returns numbers as strings; accept both.
 */
const numeric = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]);

const tokenInfoSchema = z.object({
  email: z.string().optional(),
  scope: z.union([z.string(), z.array(z.string())]).default(''),
  expires_in: numeric.optional(),
});

export interface TokenIntrospectorOptions {
  fetch?: FetchLike;
  /** Introspection endpoint (default: Google tokeninfo) */
  endpoint?: string;
  timeoutMs?: number;
}

/**
 * Split a scope claim into individual scopes.
 */
export function parseScopeClaim(scope: string | readonly string[]): Set<string> {
  const parts = typeof scope === 'string' ? scope.split(/\s+/) : scope;
  return new Set(parts.filter((s) => s.length > 0));
}

export class TokenIntrospector {
  private readonly fetchImpl: FetchLike;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(options: TokenIntrospectorOptions = {}) {
    this.fetchImpl = resolveFetch(options.fetch);
    this.endpoint = options.endpoint ?? GOOGLE_OAUTH.TOKENINFO_URI;
    validateSecureUrl(this.endpoint);
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.DEFAULT;
  }

  /**
   * Identity and scopes of the token. Cached on the token after the first
   * successful call; rejected tokens are never cached.
   */
  async tokenInfo(token: TokenFacade): Promise<IntrospectionResult> {
    const cached = token.cachedIntrospection;
    if (cached) {
      log().debug('Token info served from cache');
      return cached;
    }

    const pending = inFlight.get(token);
    if (pending) {
      return pending;
    }

    const lookup = this.introspect(token).finally(() => inFlight.delete(token));
    inFlight.set(token, lookup);
    return lookup;
  }

  private async introspect(token: TokenFacade): Promise<IntrospectionResult> {
    const url = new URL(this.endpoint);
    url.searchParams.set('access_token', token.accessToken);

    let response: HttpResponse;
    try {
      response = await fetchJson(this.fetchImpl, url.toString(), {
        headers: { Authorization: `Bearer ${token.accessToken}` },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const message = error instanceof TransportFailure ? error.message : String(error);
      throw new IntrospectionError(`Token introspection failed: ${message}`, undefined, {
        operation: 'tokenInfo',
        component: 'introspection',
      }, cause);
    }

    if (response.status === 400 || response.status === 401) {
      const { description } = describeErrorBody(response);
      log().info({ status: response.status }, 'Token rejected by introspection endpoint');
      throw new InvalidTokenError(`Token rejected by introspection endpoint: ${description}`, response.status, {
        operation: 'tokenInfo',
        component: 'introspection',
      });
    }

    if (!response.ok) {
      throw new IntrospectionError(
        `Token introspection failed: ${describeErrorBody(response).description}`,
        response.status,
        { operation: 'tokenInfo', component: 'introspection' }
      );
    }

    const parsed = tokenInfoSchema.safeParse(response.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`);
      throw new IntrospectionError(
        `Unexpected introspection response: ${issues.join('; ')}`,
        response.status,
        { operation: 'tokenInfo', component: 'introspection' }
      );
    }

    const result = createIntrospectionResult({
      email: parsed.data.email,
      scope: parseScopeClaim(parsed.data.scope),
      expiresIn: parsed.data.expires_in,
    });
    cacheIntrospection(token, result);
    log().debug({ scopes: result.scope.size, hasEmail: result.email !== undefined }, 'Token introspected');
    return result;
  }

  /**
   * Email of the identity behind the token. Requires the userinfo.email scope.
   */
  async email(token: TokenFacade): Promise<string> {
    const info = await this.tokenInfo(token);
    if (!info.email) {
      throw new IntrospectionError(
        `Token info carries no email; request the ${GOOGLE_OAUTH.USERINFO_EMAIL_SCOPE} scope`,
        undefined,
        { operation: 'email', component: 'introspection' }
      );
    }
    return info.email;
  }

  async scopes(token: TokenFacade): Promise<ReadonlySet<string>> {
    return (await this.tokenInfo(token)).scope;
  }
}
