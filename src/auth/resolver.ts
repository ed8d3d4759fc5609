/**
 * Ordered credential resolution: first success wins.
 *
 * Strategies run one at a time in the order given. "Not applicable" is
 * recorded and skipped. A failure is recorded and skipped under the
 * 'continue' policy, or rethrown as-is under 'abort'.
 */

import { NoCredentialError, type ResolutionAttempt } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import type { TokenFacade } from '../token/facade.js';
import type { AuthState } from './state.js';
import { failure, type CredentialStrategy, type RequestContext, type StrategyOutcome } from './strategies/types.js';

const log = () => getLogger('resolver');

export type FailurePolicy = 'continue' | 'abort';

export const FAILURE_POLICIES = ['continue', 'abort'] as const satisfies readonly FailurePolicy[];

export interface CredentialResolverOptions {
  /** What a strategy failure does to the resolution (default: 'continue') */
  failurePolicy?: FailurePolicy;
}

export interface ResolutionResult {
  token: TokenFacade;
  strategy: string;
  /** Strategies tried before the winner */
  skipped: readonly ResolutionAttempt[];
}

export class CredentialResolver {
  private readonly strategies: readonly CredentialStrategy[];
  readonly failurePolicy: FailurePolicy;

  constructor(strategies: readonly CredentialStrategy[], options: CredentialResolverOptions = {}) {
    this.strategies = [...strategies];
    this.failurePolicy = options.failurePolicy ?? 'continue';
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async resolve(context: RequestContext): Promise<TokenFacade> {
    return (await this.resolveDetailed(context)).token;
  }

  /**
   * Like resolve(), also reporting which strategy won and what was skipped.
   */
  async resolveDetailed(context: RequestContext): Promise<ResolutionResult> {
    const attempts: ResolutionAttempt[] = [];

    for (const strategy of this.strategies) {
      const outcome = await runStrategy(strategy, context);

      switch (outcome.kind) {
        case 'success':
          log().info({ strategy: strategy.name, package: context.package }, 'Credential resolved');
          return { token: outcome.token, strategy: strategy.name, skipped: attempts };

        case 'not-applicable':
          log().debug({ strategy: strategy.name, reason: outcome.reason }, 'Strategy not applicable');
          attempts.push({ strategy: strategy.name, kind: 'not-applicable', reason: outcome.reason });
          break;

        case 'failure':
          if (this.failurePolicy === 'abort') {
            log().warn({ strategy: strategy.name, error: outcome.error.message }, 'Strategy failed, aborting');
            throw outcome.error;
          }
          log().warn({ strategy: strategy.name, error: outcome.error.message }, 'Strategy failed, continuing');
          attempts.push({ strategy: strategy.name, kind: 'failure', reason: outcome.error.message });
          break;
      }
    }

    throw new NoCredentialError(attempts, { package: context.package, operation: 'resolve' });
  }

  /**
   * Resolve for an AuthState and install the token on it.
   */
  async populate(state: AuthState, context: RequestContext): Promise<TokenFacade> {
    const token = await this.resolve({
      ...context,
      package: context.package ?? state.package,
      client: context.client ?? state.client,
    });
    state.setCred(token);
    return token;
  }
}

/**
 * A strategy that throws is treated as having failed.
 */
async function runStrategy(strategy: CredentialStrategy, context: RequestContext): Promise<StrategyOutcome> {
  try {
    return await strategy.attempt(context);
  } catch (error) {
    return failure(error);
  }
}
