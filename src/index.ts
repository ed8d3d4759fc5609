/**
 * authbroker - credential resolution and token lifecycle for Google API clients
 *
 * @packageDocumentation
 */

// Auth
export * from './auth/index.js';

// Tokens
export {
  GoogleToken,
  cacheIntrospection,
  createIntrospectionResult,
  isTokenFacade,
  type GoogleTokenInit,
  type IntrospectionResult,
  type TokenFacade,
  type TokenRefresher,
} from './token/facade.js';
export { TokenIntrospector, parseScopeClaim, type TokenIntrospectorOptions } from './token/introspection.js';

// Token endpoint
export {
  exchangeJwtAssertion,
  exchangeRefreshToken,
  requestGrant,
  type GrantResponse,
  type RefreshGrantInput,
  type TokenEndpointOptions,
} from './oauth/token-endpoint.js';

// Secrets
export * from './secrets/index.js';

// Composition
export { createBroker, type Broker, type BrokerOptions } from './broker.js';

// Config
export {
  loadConfig,
  findConfigFile,
  getDefaultConfig,
  generateDefaultConfig,
  brokerConfigSchema,
  CONFIG_NAMES,
  type BrokerConfig,
  type LoadConfigOptions,
} from './config/loader.js';

// Errors
export * from './errors/types.js';
export { withRetry, createRetryWrapper, type RetryOptions } from './errors/retry.js';

// Logging
export {
  createLogger,
  getLogger,
  configureLogger,
  resetLogger,
  suppressLogs,
  restoreLogLevel,
  maskSecret,
  type LogLevel,
  type LoggerConfig,
  type Logger,
} from './logging/logger.js';

// HTTP
export { type FetchLike } from './transport/http.js';

export { VERSION, PACKAGE_NAME } from './version.js';
