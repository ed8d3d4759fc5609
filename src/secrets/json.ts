/**
 * Encrypted JSON documents keyed by a random key kept in an environment
 * variable, for material that should live inline (fixtures, CI config)
 * rather than as a file under secret/.
 */

import { randomBytes } from 'crypto';
import { SECRETS } from '../constants.js';
import { ConfigurationError, PasswordUnavailableError } from '../errors/types.js';
import {
  decryptBytes,
  encryptBytes,
  parseSecret,
  serializeSecret,
  toEnvironment,
  type EnvironmentSource,
} from './store.js';

/**
 * A fresh key, base64url encoded, to be stored in an environment variable.
 */
export function makeKey(): string {
  return randomBytes(SECRETS.KEY_BYTES).toString('base64url');
}

export function hasKey(keyEnvVar: string, options: { env?: EnvironmentSource } = {}): boolean {
  try {
    return Boolean(toEnvironment(options.env)(keyEnvVar));
  } catch {
    return false;
  }
}

function loadKey(keyEnvVar: string, env?: EnvironmentSource): Buffer {
  const encoded = toEnvironment(env)(keyEnvVar);
  if (!encoded) {
    throw new PasswordUnavailableError(keyEnvVar, { operation: 'loadKey' });
  }
  const key = Buffer.from(encoded, 'base64url');
  if (key.length !== SECRETS.KEY_BYTES) {
    throw new ConfigurationError(
      `${keyEnvVar} must hold a ${SECRETS.KEY_BYTES}-byte base64url key (see makeKey()), got ${key.length} bytes`,
      { operation: 'loadKey' }
    );
  }
  return key;
}

/**
 * Encrypt a JSON document. Accepts JSON text or any serializable value.
 */
export function encryptJson(json: unknown, keyEnvVar: string, options: { env?: EnvironmentSource } = {}): string {
  let text: string;
  if (typeof json === 'string') {
    try {
      JSON.parse(json);
    } catch (error) {
      throw new ConfigurationError('Input to encryptJson is not valid JSON', { operation: 'encryptJson' }, error instanceof Error ? error : undefined);
    }
    text = json;
  } else {
    const serialized: string | undefined = JSON.stringify(json);
    if (serialized === undefined) {
      throw new ConfigurationError('Input to encryptJson is not valid JSON', { operation: 'encryptJson' });
    }
    text = serialized;
  }
  const key = loadKey(keyEnvVar, options.env);
  return serializeSecret(encryptBytes(Buffer.from(text, 'utf8'), key)).trim();
}

/**
 * Decrypt a document produced by encryptJson and return its JSON text.
 */
export function decryptJson(encoded: string, keyEnvVar: string, options: { env?: EnvironmentSource } = {}): string {
  const key = loadKey(keyEnvVar, options.env);
  return decryptBytes(parseSecret(encoded), key).toString('utf8');
}
