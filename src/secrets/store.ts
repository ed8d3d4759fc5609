/**
 * Password-keyed secret store.
 *
 * Encrypted files live at `<package root>/secret/<name>` and can be committed.
 * The key is the SHA-256 of the password held in `<PACKAGE>_PASSWORD`; where
 * that variable is missing (forks, local checkouts) reads fail with
 * DecryptionUnavailableError so callers can skip instead of failing.
 */

import { createRequire } from 'module';
import { createCipheriv, createDecipheriv, createHash, getCiphers, randomBytes } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { SECRETS } from '../constants.js';
import {
  ConfigurationError,
  DecryptionFailedError,
  DecryptionUnavailableError,
  PasswordUnavailableError,
  SecretFormatError,
} from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

const require = createRequire(import.meta.url);
const log = () => getLogger('secrets');

/**
 * Read access to environment variables.
 */
export type Environment = (name: string) => string | undefined;

export type EnvironmentSource = Environment | Record<string, string | undefined>;

export function toEnvironment(source: EnvironmentSource = process.env): Environment {
  if (typeof source === 'function') {
    return source;
  }
  const vars = source;
  return (name) => vars[name];
}

export interface EncryptedSecret {
  readonly ciphertext: Buffer;
  readonly nonce: Buffer;
}

/**
 * Environment variable holding the password for a package.
 *
 * @example
 * passwordName('sheets')         // 'SHEETS_PASSWORD'
 * passwordName('@acme/my-pkg')   // '_ACME_MY_PKG_PASSWORD'
 */
export function passwordName(pkg: string): string {
  return `${pkg.toUpperCase().replace(/[^A-Z0-9_]/g, '_')}_PASSWORD`;
}

export function isCipherAvailable(): boolean {
  try {
    return getCiphers().includes(SECRETS.CIPHER);
  } catch {
    return false;
  }
}

// =============================================================================
// Primitive: AES-256-GCM, tag appended to the ciphertext
// =============================================================================

export function encryptBytes(data: Uint8Array, key: Buffer, nonce: Buffer = randomBytes(SECRETS.NONCE_BYTES)): EncryptedSecret {
  const cipher = createCipheriv(SECRETS.CIPHER, key, nonce);
  const body = Buffer.concat([cipher.update(data), cipher.final()]);
  return { ciphertext: Buffer.concat([body, cipher.getAuthTag()]), nonce };
}

export function decryptBytes(secret: EncryptedSecret, key: Buffer): Buffer {
  if (secret.ciphertext.length < SECRETS.TAG_BYTES) {
    throw new SecretFormatError('Ciphertext is shorter than its authentication tag');
  }
  const body = secret.ciphertext.subarray(0, secret.ciphertext.length - SECRETS.TAG_BYTES);
  const tag = secret.ciphertext.subarray(secret.ciphertext.length - SECRETS.TAG_BYTES);
  try {
    const decipher = createDecipheriv(SECRETS.CIPHER, key, secret.nonce);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (error) {
    throw new DecryptionFailedError(
      'Secret could not be decrypted; the password is wrong or the file was altered',
      { component: 'secrets' },
      error instanceof Error ? error : undefined
    );
  }
}

// =============================================================================
// Serialized layout: authbroker:v1:<nonce hex>:<ciphertext hex>
// =============================================================================

export function serializeSecret(secret: EncryptedSecret): string {
  return `${SECRETS.PREFIX}:${secret.nonce.toString('hex')}:${secret.ciphertext.toString('hex')}\n`;
}

export function parseSecret(text: string): EncryptedSecret {
  const trimmed = text.trim();
  const prefix = `${SECRETS.PREFIX}:`;
  if (!trimmed.startsWith(prefix)) {
    throw new SecretFormatError(`Secret does not start with ${prefix}`);
  }
  const parts = trimmed.slice(prefix.length).split(':');
  const hex = /^(?:[0-9a-f]{2})+$/;
  if (parts.length !== 2 || !hex.test(parts[0]) || !hex.test(parts[1])) {
    throw new SecretFormatError('Secret must be <nonce hex>:<ciphertext hex>');
  }
  const nonce = Buffer.from(parts[0], 'hex');
  if (nonce.length !== SECRETS.NONCE_BYTES) {
    throw new SecretFormatError(`Nonce must be ${SECRETS.NONCE_BYTES} bytes, got ${nonce.length}`);
  }
  return { nonce, ciphertext: Buffer.from(parts[1], 'hex') };
}

// =============================================================================
// Package roots
// =============================================================================

function readPackageName(packageJsonPath: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && typeof parsed.name === 'string') {
      return parsed.name;
    }
  } catch {
    // No package.json here
  }
  return undefined;
}

/**
 * Root directory of a package: the working directory when it is that
 * package, otherwise wherever Node resolves the package from.
 */
export function packageRoot(pkg: string, cwd: string = process.cwd()): string {
  if (readPackageName(join(cwd, 'package.json')) === pkg) {
    return cwd;
  }
  try {
    return dirname(require.resolve(`${pkg}/package.json`, { paths: [cwd] }));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot locate the root of package ${pkg}`,
      { package: pkg, component: 'secrets' },
      error instanceof Error ? error : undefined
    );
  }
}

// =============================================================================
// Store
// =============================================================================

export interface SecretStoreOptions {
  env?: EnvironmentSource;
  /** Root directory for a package's secret/ folder (default: packageRoot) */
  rootFor?: (pkg: string) => string;
  /** Whether the cipher exists in this runtime (default: checks crypto) */
  cipherAvailable?: () => boolean;
}

export class SecretStore {
  private readonly env: Environment;
  private readonly rootFor: (pkg: string) => string;
  private readonly cipherAvailable: () => boolean;

  constructor(options: SecretStoreOptions = {}) {
    this.env = toEnvironment(options.env);
    this.rootFor = options.rootFor ?? ((pkg) => packageRoot(pkg));
    this.cipherAvailable = options.cipherAvailable ?? isCipherAvailable;
  }

  passwordName(pkg: string): string {
    return passwordName(pkg);
  }

  /**
   * Whether read() can succeed for this package. Touches only the environment.
   */
  canDecrypt(pkg: string): boolean {
    try {
      return this.unavailableReason(pkg) === undefined;
    } catch (error) {
      log().debug({ package: pkg, error: error instanceof Error ? error.message : String(error) }, 'Environment lookup failed');
      return false;
    }
  }

  /**
   * Why secrets cannot be decrypted, or undefined when they can. Handy for
   * `it.skipIf(store.skipUnlessDecryptable('pkg'))`.
   */
  skipUnlessDecryptable(pkg: string): string | undefined {
    return this.unavailableReason(pkg);
  }

  /**
   * Path of a secret, whether or not it exists yet.
   */
  secretPath(pkg: string, name: string): string {
    if (!name || name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
      throw new ConfigurationError(`Invalid secret name "${name}"`, { package: pkg, component: 'secrets' });
    }
    return join(this.rootFor(pkg), SECRETS.DIR, name);
  }

  /**
   * Encrypt and persist a secret. A string input is a path to read bytes from.
   * Authoring-time operation: a missing password is fatal.
   */
  write(pkg: string, name: string, input: string | Uint8Array): string {
    const key = this.requireKey(pkg);
    const data = typeof input === 'string' ? readFileSync(input) : input;
    const path = this.secretPath(pkg, name);

    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, serializeSecret(encryptBytes(data, key)), 'utf-8');
    log().info({ package: pkg, name, bytes: data.length }, 'Secret written');
    return path;
  }

  /**
   * Decrypt a persisted secret.
   *
   * @throws DecryptionUnavailableError before any file access when no password is set
   */
  read(pkg: string, name: string): Buffer {
    const reason = this.unavailableReason(pkg);
    if (reason !== undefined) {
      throw new DecryptionUnavailableError(passwordName(pkg), reason, { package: pkg, operation: 'read' });
    }
    const key = this.requireKey(pkg);
    const path = this.secretPath(pkg, name);

    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (error) {
      throw new SecretFormatError(`Secret ${name} of ${pkg} cannot be read from ${path}`, {
        package: pkg,
        metadata: { path, error: error instanceof Error ? error.message : String(error) },
      });
    }
    const plaintext = decryptBytes(parseSecret(text), key);
    log().debug({ package: pkg, name }, 'Secret read');
    return plaintext;
  }

  private unavailableReason(pkg: string): string | undefined {
    const envVar = passwordName(pkg);
    if (!this.env(envVar)) {
      return `${envVar} is not set`;
    }
    if (!this.cipherAvailable()) {
      return `${SECRETS.CIPHER} is not available in this runtime`;
    }
    return undefined;
  }

  private requireKey(pkg: string): Buffer {
    const envVar = passwordName(pkg);
    const password = this.env(envVar);
    if (!password) {
      throw new PasswordUnavailableError(envVar, { package: pkg, operation: 'write' });
    }
    return createHash('sha256').update(password, 'utf8').digest();
  }
}
