/**
 * Wires a loaded BrokerConfig into a resolver and an introspector.
 */

import { CredentialResolver } from './auth/resolver.js';
import { defaultStrategies, type DefaultStrategiesOptions } from './auth/strategies/index.js';
import type { CredentialStrategy } from './auth/strategies/types.js';
import type { BrokerConfig } from './config/loader.js';
import { configureLogger } from './logging/logger.js';
import { TokenIntrospector } from './token/introspection.js';
import type { FetchLike } from './transport/http.js';

export interface BrokerOptions {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  /** Replaces the default strategy list */
  strategies?: readonly CredentialStrategy[];
  /** Per-strategy overrides merged over the config-derived options */
  strategyOptions?: DefaultStrategiesOptions;
}

export interface Broker {
  readonly config: BrokerConfig;
  readonly resolver: CredentialResolver;
  readonly introspector: TokenIntrospector;
}

export function createBroker(config: BrokerConfig, options: BrokerOptions = {}): Broker {
  configureLogger({ level: config.logLevel });

  const endpoint = { tokenUri: config.tokenUri, timeoutMs: config.timeoutMs };
  const overrides = options.strategyOptions ?? {};
  const strategies =
    options.strategies ??
    defaultStrategies({
      fetch: options.fetch,
      env: options.env,
      ...overrides,
      serviceAccount: { ...endpoint, ...overrides.serviceAccount },
      appDefault: { ...endpoint, ...overrides.appDefault },
      userCache: { ...endpoint, cacheDir: config.oauthCache, email: config.oauthEmail, ...overrides.userCache },
      ambient: { timeoutMs: config.timeoutMs, ...overrides.ambient },
    });

  return {
    config,
    resolver: new CredentialResolver(strategies, { failurePolicy: config.failurePolicy }),
    introspector: new TokenIntrospector({
      fetch: options.fetch,
      endpoint: config.introspectionEndpoint,
      timeoutMs: config.timeoutMs,
    }),
  };
}
