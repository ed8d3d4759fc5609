/**
 * Credential strategy contract.
 *
 * A strategy either produces a token, declares itself not applicable (its
 * preconditions are absent, keep going), or fails (it was meant to work and
 * did not; the resolver reports the reason).
 */

import type { TokenFacade } from '../../token/facade.js';
import type { OAuthClientIdentity } from '../client.js';

export interface ResolutionHints {
  /** Preferred account email for cached user grants; '*' accepts any single match */
  email?: string;
  /** Path to a service-account key file */
  path?: string;
  /** Externally supplied token, or a request configuration wrapping one */
  token?: unknown;
}

export interface RequestContext {
  scopes: readonly string[];
  package?: string;
  client?: OAuthClientIdentity;
  hints?: ResolutionHints;
}

export type StrategyOutcome =
  | { kind: 'success'; token: TokenFacade }
  | { kind: 'not-applicable'; reason: string }
  | { kind: 'failure'; error: Error };

export interface CredentialStrategy {
  readonly name: string;
  attempt(context: RequestContext): Promise<StrategyOutcome>;
}

export function success(token: TokenFacade): StrategyOutcome {
  return { kind: 'success', token };
}

export function notApplicable(reason: string): StrategyOutcome {
  return { kind: 'not-applicable', reason };
}

export function failure(error: unknown): StrategyOutcome {
  return { kind: 'failure', error: error instanceof Error ? error : new Error(String(error)) };
}
