/**
 * Bring-your-own token: accept a caller-built token after checking its
 * shape and the authorization server it came from.
 */

import { GOOGLE_OAUTH } from '../../constants.js';
import { InvalidTokenTypeError, WrongEndpointError } from '../../errors/types.js';
import { getLogger } from '../../logging/logger.js';
import { isTokenFacade, type TokenFacade } from '../../token/facade.js';
import { failure, notApplicable, success, type CredentialStrategy } from './types.js';

const log = () => getLogger('strategy:explicit');

/**
 * A request configuration carrying a token alongside other request options.
 */
export interface RequestConfig {
  token: unknown;
  [option: string]: unknown;
}

function isRequestConfig(value: unknown): value is RequestConfig {
  return typeof value === 'object' && value !== null && 'token' in value && !isTokenFacade(value);
}

/**
 * Name the shape of a rejected value for the error message.
 */
export function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value !== 'object') return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor === 'function' && ctor.name && ctor.name !== 'Object') {
    return `${ctor.name} object`;
  }
  return 'object';
}

/**
 * Validate an externally supplied token and return it unchanged.
 *
 * @throws InvalidTokenTypeError when the value lacks the token capability set
 * @throws WrongEndpointError when the token was issued by another authorization server
 */
export function acceptExternalToken(
  candidate: unknown,
  expectedHost: string = GOOGLE_OAUTH.AUTH_HOST
): TokenFacade {
  const token = isRequestConfig(candidate) ? candidate.token : candidate;

  if (!isTokenFacade(token)) {
    throw new InvalidTokenTypeError(describeShape(token), { operation: 'acceptExternalToken' });
  }

  if (token.endpointHost.toLowerCase() !== expectedHost.toLowerCase()) {
    throw new WrongEndpointError(token.endpointHost, expectedHost, { operation: 'acceptExternalToken' });
  }

  return token;
}

/**
 * Strategy wrapping acceptExternalToken for the token passed in the hints.
 */
export function explicitStrategy(options: { token?: unknown; expectedHost?: string } = {}): CredentialStrategy {
  return {
    name: 'explicit',
    async attempt(context) {
      const candidate = context.hints?.token ?? options.token;
      if (candidate === undefined) {
        return notApplicable('no token was supplied');
      }
      try {
        const token = acceptExternalToken(candidate, options.expectedHost);
        log().debug('Accepted caller-supplied token');
        return success(token);
      } catch (error) {
        return failure(error);
      }
    },
  };
}
