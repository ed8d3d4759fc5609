/**
 * Per-package auth configuration: which client to use, an optional API key,
 * whether requests should carry a token, and the token once resolved.
 */

import { ConfigurationError } from '../errors/types.js';
import { maskSecret } from '../logging/logger.js';
import type { TokenFacade } from '../token/facade.js';
import type { OAuthClientIdentity } from './client.js';

export interface AuthStateInit {
  package: string;
  client?: OAuthClientIdentity;
  apiKey?: string;
  /** Whether requests should be authenticated with a token (default: true) */
  active?: boolean;
  cred?: TokenFacade;
}

export class AuthState {
  readonly package: string;
  private _client?: OAuthClientIdentity;
  private _apiKey?: string;
  private _active: boolean;
  private _cred?: TokenFacade;

  private constructor(init: AuthStateInit & { active: boolean }) {
    this.package = init.package;
    this._client = init.client;
    this._apiKey = init.apiKey;
    this._active = init.active;
    this._cred = init.cred;
  }

  /**
   * An inactive state must have an API key to send instead of a token.
   */
  static create(init: AuthStateInit): AuthState {
    if (!init.package) {
      throw new ConfigurationError('AuthState requires a package name');
    }
    const active = init.active ?? true;
    if (!active && !init.apiKey) {
      throw new ConfigurationError(
        `Auth for ${init.package} is inactive but no API key was supplied; nothing could authenticate requests`,
        { package: init.package, operation: 'create' }
      );
    }
    return new AuthState({ ...init, active });
  }

  get client(): OAuthClientIdentity | undefined {
    return this._client;
  }

  get apiKey(): string | undefined {
    return this._apiKey;
  }

  get active(): boolean {
    return this._active;
  }

  get cred(): TokenFacade | undefined {
    return this._cred;
  }

  /**
   * Install a newly resolved token. Implies active.
   */
  setCred(token: TokenFacade): void {
    this._cred = token;
    this._active = true;
  }

  /**
   * Drop the token; the active flag is left as is so the next request re-resolves.
   */
  clearCred(): void {
    this._cred = undefined;
  }

  hasCred(): boolean {
    return this._cred !== undefined;
  }

  getCred(): TokenFacade | undefined {
    return this._cred;
  }

  setClient(client: OAuthClientIdentity | undefined): void {
    this._client = client;
  }

  setApiKey(apiKey: string | undefined): void {
    if (!apiKey && !this._active) {
      throw new ConfigurationError(`Cannot remove the API key of inactive auth for ${this.package}`, {
        package: this.package,
        operation: 'setApiKey',
      });
    }
    this._apiKey = apiKey || undefined;
  }

  setActive(active: boolean): void {
    if (!active && !this._apiKey) {
      throw new ConfigurationError(`Cannot deactivate auth for ${this.package} without an API key`, {
        package: this.package,
        operation: 'setActive',
      });
    }
    this._active = active;
  }

  /**
   * Log-safe summary.
   */
  describe(): Record<string, unknown> {
    return {
      package: this.package,
      client: this._client?.name ?? this._client?.id,
      apiKey: this._apiKey ? maskSecret(this._apiKey) : undefined,
      active: this._active,
      hasCred: this.hasCred(),
    };
  }
}
