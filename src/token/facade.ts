/**
 * Token facade: the capability set every credential must expose, and the
 * concrete GoogleToken the built-in strategies produce.
 *
 * External token objects are accepted by shape, not by class. The check
 * happens once, when the token enters the broker (see acceptExternalToken).
 */

import { BrokerError } from '../errors/types.js';
import { GOOGLE_OAUTH, TIMEOUTS } from '../constants.js';

/**
 * What token introspection learned about a token. Frozen on creation.
 */
export interface IntrospectionResult {
  readonly email?: string;
  readonly scope: ReadonlySet<string>;
  /** Seconds remaining at the time of introspection */
  readonly expiresIn?: number;
}

export function createIntrospectionResult(input: {
  email?: string;
  scope: Iterable<string>;
  expiresIn?: number;
}): IntrospectionResult {
  return Object.freeze({
    email: input.email,
    scope: new Set(input.scope),
    expiresIn: input.expiresIn,
  });
}

/**
 * Any bearer-token-like credential usable by the broker.
 */
export interface TokenFacade {
  readonly accessToken: string;
  /** Host of the authorization server that issued the token */
  readonly endpointHost: string;
  readonly refreshToken?: string;
  readonly expiry?: Date;
  readonly scopes?: ReadonlySet<string>;
  /** Write-once introspection cache */
  cachedIntrospection?: IntrospectionResult;
  isExpired(): boolean;
  /** Obtain a fresh token. The receiver is left untouched. */
  refresh(): Promise<TokenFacade>;
}

/**
 * Capability check performed at ingestion.
 */
export function isTokenFacade(value: unknown): value is TokenFacade {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'accessToken' in value &&
    typeof value.accessToken === 'string' &&
    'endpointHost' in value &&
    typeof value.endpointHost === 'string' &&
    'isExpired' in value &&
    typeof value.isExpired === 'function' &&
    'refresh' in value &&
    typeof value.refresh === 'function'
  );
}

/**
 * Record an introspection result on a token, enforcing write-once.
 */
export function cacheIntrospection(token: TokenFacade, result: IntrospectionResult): void {
  if (token.cachedIntrospection !== undefined) {
    throw new BrokerError('Introspection result is already cached on this token', {
      code: 'INTROSPECTION_ALREADY_CACHED',
      severity: 'low',
      retryable: 'terminal',
    });
  }
  token.cachedIntrospection = result;
}

/**
 * Produces a replacement token. Supplied by the strategy that created the token.
 */
export type TokenRefresher = (token: GoogleToken) => Promise<GoogleToken>;

export interface GoogleTokenInit {
  accessToken: string;
  refreshToken?: string;
  /** Absolute expiry; takes precedence over expiresIn */
  expiry?: Date;
  /** Seconds from now until expiry */
  expiresIn?: number;
  scopes?: Iterable<string>;
  endpointHost?: string;
  /** Name of the strategy that produced the token, for diagnostics */
  source?: string;
  refresher?: TokenRefresher;
  /** Clock, for tests */
  now?: () => number;
}

/**
 * Token produced by the built-in strategies.
 */
export class GoogleToken implements TokenFacade {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly expiry?: Date;
  readonly scopes: ReadonlySet<string>;
  readonly endpointHost: string;
  readonly source: string;

  private introspection?: IntrospectionResult;
  private readonly refresher?: TokenRefresher;
  private readonly now: () => number;

  constructor(init: GoogleTokenInit) {
    this.now = init.now ?? Date.now;
    this.accessToken = init.accessToken;
    this.refreshToken = init.refreshToken;
    this.expiry =
      init.expiry ??
      (init.expiresIn !== undefined ? new Date(this.now() + init.expiresIn * 1000) : undefined);
    this.scopes = new Set(init.scopes ?? []);
    this.endpointHost = init.endpointHost ?? GOOGLE_OAUTH.AUTH_HOST;
    this.source = init.source ?? 'unknown';
    this.refresher = init.refresher;
  }

  get cachedIntrospection(): IntrospectionResult | undefined {
    return this.introspection;
  }

  set cachedIntrospection(result: IntrospectionResult | undefined) {
    if (this.introspection !== undefined) {
      throw new BrokerError('Introspection result is already cached on this token', {
        code: 'INTROSPECTION_ALREADY_CACHED',
        severity: 'low',
        retryable: 'terminal',
      });
    }
    this.introspection = result;
  }

  /**
   * Expired once within the skew window of the expiry. A token without an
   * expiry never reports itself expired.
   */
  isExpired(): boolean {
    if (!this.expiry) {
      return false;
    }
    return this.now() >= this.expiry.getTime() - TIMEOUTS.EXPIRY_SKEW_SECONDS * 1000;
  }

  get canRefresh(): boolean {
    return this.refresher !== undefined;
  }

  async refresh(): Promise<GoogleToken> {
    if (!this.refresher) {
      throw new BrokerError(`Token from ${this.source} cannot be refreshed`, {
        code: 'TOKEN_NOT_REFRESHABLE',
        severity: 'medium',
        retryable: 'terminal',
        context: { strategy: this.source },
      });
    }
    return this.refresher(this);
  }

  /**
   * Log-safe view; never includes token material.
   */
  toJSON(): Record<string, unknown> {
    return {
      source: this.source,
      endpointHost: this.endpointHost,
      scopes: [...this.scopes],
      expiry: this.expiry?.toISOString(),
      hasRefreshToken: this.refreshToken !== undefined,
    };
  }
}
