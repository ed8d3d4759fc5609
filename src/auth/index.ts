/**
 * Authentication: per-package state, strategies and the resolver.
 */

export { AuthState, type AuthStateInit } from './state.js';
export {
  CredentialResolver,
  FAILURE_POLICIES,
  type CredentialResolverOptions,
  type FailurePolicy,
  type ResolutionResult,
} from './resolver.js';
export { createOAuthClient, oauthClientFromJson, type OAuthClientIdentity } from './client.js';
export * from './strategies/index.js';
