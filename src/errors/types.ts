/**
 * Error types for authbroker.
 *
 * Error hierarchy:
 * - BrokerError (base)
 *   - ConfigurationError (invalid state, client, key material)
 *     - ConfigNotFoundError, ConfigValidationError
 *   - TokenError (token shape and provenance)
 *     - InvalidTokenTypeError, WrongEndpointError
 *   - NoCredentialError (every strategy exhausted)
 *   - IntrospectionError, InvalidTokenError (tokeninfo)
 *   - TokenExchangeError (token endpoint grants)
 *   - SecretError (secret store)
 *     - PasswordUnavailableError, DecryptionUnavailableError,
 *       SecretFormatError, DecryptionFailedError
 */

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Whether an error is retryable.
 */
export type RetryableStatus = 'retryable' | 'terminal' | 'unknown';

/**
 * Error context for debugging and recovery.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** Package whose auth was being resolved */
  package?: string;
  /** Strategy name if applicable */
  strategy?: string;
  /** Timing information */
  timing?: {
    startedAt: Date;
    failedAt: Date;
    durationMs: number;
  };
  /** Retry information */
  retry?: {
    attempt: number;
    maxAttempts: number;
    nextDelayMs?: number;
  };
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

interface BrokerErrorOptions {
  code: string;
  severity?: ErrorSeverity;
  retryable?: RetryableStatus;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all authbroker errors.
 */
export class BrokerError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Error severity */
  readonly severity: ErrorSeverity;
  /** Whether this error is retryable */
  readonly retryable: RetryableStatus;
  /** Error context for debugging */
  readonly context: ErrorContext;
  /** Original error if this wraps another */
  readonly cause?: Error;

  constructor(message: string, options: BrokerErrorOptions) {
    super(message);
    this.name = 'BrokerError';
    this.code = options.code;
    this.severity = options.severity ?? 'medium';
    this.retryable = options.retryable ?? 'unknown';
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a new error with additional context.
   */
  withContext(additionalContext: Partial<ErrorContext>): BrokerError {
    return new BrokerError(this.message, {
      code: this.code,
      severity: this.severity,
      retryable: this.retryable,
      context: { ...this.context, ...additionalContext },
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Invalid auth state, client identity or key material.
 */
export class ConfigurationError extends BrokerError {
  constructor(message: string, context?: ErrorContext, cause?: Error, code = 'CONFIGURATION_ERROR') {
    super(message, {
      code,
      severity: 'high',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Configuration file not found.
 */
export class ConfigNotFoundError extends ConfigurationError {
  /** Path that was searched */
  readonly path: string;

  constructor(path: string, context?: ErrorContext) {
    super(
      `Configuration file not found: ${path}`,
      { ...context, metadata: { ...context?.metadata, path } },
      undefined,
      'CONFIG_NOT_FOUND'
    );
    this.name = 'ConfigNotFoundError';
    this.path = path;
  }
}

/**
 * Configuration validation failed.
 */
export class ConfigValidationError extends ConfigurationError {
  /** Validation errors */
  readonly validationErrors: string[];

  constructor(errors: string[], context?: ErrorContext) {
    super(
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      { ...context, metadata: { ...context?.metadata, validationErrors: errors } },
      undefined,
      'CONFIG_VALIDATION_FAILED'
    );
    this.name = 'ConfigValidationError';
    this.validationErrors = errors;
  }
}

// =============================================================================
// Token Errors
// =============================================================================

/**
 * Base class for errors about a token's shape or provenance.
 */
export class TokenError extends BrokerError {
  constructor(message: string, options: BrokerErrorOptions) {
    super(message, options);
    this.name = 'TokenError';
  }
}

/**
 * The supplied value does not expose the token capability set.
 */
export class InvalidTokenTypeError extends TokenError {
  /** Description of the rejected shape, e.g. 'string' */
  readonly shape: string;

  constructor(shape: string, context?: ErrorContext) {
    super(
      `Expected a token object exposing accessToken, endpointHost, isExpired() and refresh(), ` +
        `not ${/^[aeiou]/i.test(shape) ? 'an' : 'a'} ${shape}`,
      {
        code: 'INVALID_TOKEN_TYPE',
        severity: 'high',
        retryable: 'terminal',
        context: { ...context, metadata: { ...context?.metadata, shape } },
      }
    );
    this.name = 'InvalidTokenTypeError';
    this.shape = shape;
  }
}

/**
 * Token is structurally valid but was issued by a different authorization server.
 */
export class WrongEndpointError extends TokenError {
  readonly actualHost: string;
  readonly expectedHost: string;

  constructor(actualHost: string, expectedHost: string, context?: ErrorContext) {
    super(
      `Token was issued for authorization host "${actualHost}"; only "${expectedHost}" tokens are accepted`,
      {
        code: 'WRONG_ENDPOINT',
        severity: 'high',
        retryable: 'terminal',
        context: { ...context, metadata: { ...context?.metadata, actualHost, expectedHost } },
      }
    );
    this.name = 'WrongEndpointError';
    this.actualHost = actualHost;
    this.expectedHost = expectedHost;
  }
}

// =============================================================================
// Resolution Errors
// =============================================================================

/**
 * One strategy's contribution to a failed resolution.
 */
export interface ResolutionAttempt {
  strategy: string;
  kind: 'not-applicable' | 'failure';
  reason: string;
}

/**
 * Every strategy was tried and none produced a token.
 */
export class NoCredentialError extends BrokerError {
  readonly attempts: readonly ResolutionAttempt[];

  constructor(attempts: readonly ResolutionAttempt[], context?: ErrorContext) {
    const detail = attempts.length
      ? attempts.map((a) => `  - ${a.strategy}: ${a.reason}`).join('\n')
      : '  (no strategies were supplied)';
    super(`Unable to obtain a credential:\n${detail}`, {
      code: 'NO_CREDENTIAL',
      severity: 'high',
      retryable: 'terminal',
      context,
    });
    this.name = 'NoCredentialError';
    this.attempts = attempts;
  }
}

// =============================================================================
// Introspection Errors
// =============================================================================

/**
 * The introspection endpoint could not be reached or answered unexpectedly.
 */
export class IntrospectionError extends BrokerError {
  /** HTTP status if a response was received */
  readonly status?: number;

  constructor(message: string, status?: number, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'INTROSPECTION_FAILED',
      severity: 'medium',
      retryable: 'retryable',
      context: { ...context, metadata: { ...context?.metadata, status } },
      cause,
    });
    this.name = 'IntrospectionError';
    this.status = status;
  }
}

/**
 * The introspection endpoint rejected the token (expired or revoked).
 */
export class InvalidTokenError extends BrokerError {
  readonly status: number;

  constructor(message: string, status: number, context?: ErrorContext) {
    super(message, {
      code: 'INVALID_TOKEN',
      severity: 'high',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, status } },
    });
    this.name = 'InvalidTokenError';
    this.status = status;
  }
}

/**
 * A grant request against the token endpoint failed.
 */
export class TokenExchangeError extends BrokerError {
  readonly status?: number;
  /** OAuth error code from the response body, e.g. 'invalid_grant' */
  readonly oauthError?: string;

  constructor(
    message: string,
    options: { status?: number; oauthError?: string; context?: ErrorContext; cause?: Error } = {}
  ) {
    const { status, oauthError } = options;
    const retryable: RetryableStatus =
      status === undefined || status >= 500 || status === 429 ? 'retryable' : 'terminal';
    super(message, {
      code: 'TOKEN_EXCHANGE_FAILED',
      severity: 'high',
      retryable,
      context: { ...options.context, metadata: { ...options.context?.metadata, status, oauthError } },
      cause: options.cause,
    });
    this.name = 'TokenExchangeError';
    this.status = status;
    this.oauthError = oauthError;
  }
}

// =============================================================================
// Secret Errors
// =============================================================================

/**
 * Base class for secret store errors.
 */
export class SecretError extends BrokerError {
  constructor(message: string, options: BrokerErrorOptions) {
    super(message, options);
    this.name = 'SecretError';
  }
}

/**
 * Encryption was requested but no password is set. Fatal at authoring time.
 */
export class PasswordUnavailableError extends SecretError {
  readonly envVar: string;

  constructor(envVar: string, context?: ErrorContext) {
    super(`Environment variable ${envVar} is not set; cannot encrypt`, {
      code: 'PASSWORD_UNAVAILABLE',
      severity: 'critical',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, envVar } },
    });
    this.name = 'PasswordUnavailableError';
    this.envVar = envVar;
  }
}

/**
 * Decryption is not possible in this environment. Callers skip, not fail.
 */
export class DecryptionUnavailableError extends SecretError {
  readonly envVar: string;

  constructor(envVar: string, reason: string, context?: ErrorContext) {
    super(`Secrets cannot be decrypted: ${reason}`, {
      code: 'DECRYPTION_UNAVAILABLE',
      severity: 'low',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, envVar } },
    });
    this.name = 'DecryptionUnavailableError';
    this.envVar = envVar;
  }
}

/**
 * Persisted secret does not match the expected layout.
 */
export class SecretFormatError extends SecretError {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      code: 'SECRET_FORMAT_INVALID',
      severity: 'high',
      retryable: 'terminal',
      context,
    });
    this.name = 'SecretFormatError';
  }
}

/**
 * Authenticated decryption failed: wrong password or tampered ciphertext.
 */
export class DecryptionFailedError extends SecretError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'DECRYPTION_FAILED',
      severity: 'high',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'DecryptionFailedError';
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}

/**
 * True for the one error kind callers downgrade into a skip.
 */
export function isDecryptionUnavailable(error: unknown): error is DecryptionUnavailableError {
  return error instanceof DecryptionUnavailableError;
}

/**
 * Check if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (isBrokerError(error)) {
    return error.retryable === 'retryable';
  }
  // Unknown errors: only transient network failures
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('fetch failed') ||
      message.includes('429')
    );
  }
  return false;
}

/**
 * Wrap an unknown error in a BrokerError.
 */
export function wrapError(error: unknown, context?: ErrorContext): BrokerError {
  if (isBrokerError(error)) {
    return context ? error.withContext(context) : error;
  }

  const originalError = toError(error);

  return new BrokerError(originalError.message, {
    code: 'UNKNOWN_ERROR',
    severity: 'medium',
    retryable: 'unknown',
    context,
    cause: originalError,
  });
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create timing context for error tracking.
 */
export function createTimingContext(startedAt: Date): ErrorContext['timing'] {
  const failedAt = new Date();
  return {
    startedAt,
    failedAt,
    durationMs: failedAt.getTime() - startedAt.getTime(),
  };
}
