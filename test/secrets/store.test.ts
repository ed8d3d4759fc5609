import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  decryptBytes,
  encryptBytes,
  packageRoot,
  parseSecret,
  passwordName,
  SecretStore,
  serializeSecret,
} from '../../src/secrets/store.js';
import {
  ConfigurationError,
  DecryptionFailedError,
  DecryptionUnavailableError,
  isDecryptionUnavailable,
  PasswordUnavailableError,
  SecretFormatError,
} from '../../src/errors/types.js';

const PASSWORD_ENV = { SHEETS_PASSWORD: 'test-secret' };

describe('secrets/store', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `authbroker-secrets-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function store(env: Record<string, string | undefined> = PASSWORD_ENV): SecretStore {
    return new SecretStore({ env, rootFor: () => testDir });
  }

  describe('passwordName', () => {
    it('should upper-case the package name', () => {
      expect(passwordName('sheets')).toBe('SHEETS_PASSWORD');
    });

    it('should replace characters that cannot appear in a variable name', () => {
      expect(passwordName('@acme/my-pkg')).toBe('_ACME_MY_PKG_PASSWORD');
      expect(passwordName('pkg.v2')).toBe('PKG_V2_PASSWORD');
    });

    it('should be exposed on the store', () => {
      expect(store().passwordName('sheets')).toBe('SHEETS_PASSWORD');
    });
  });

  describe('canDecrypt', () => {
    it('should be true when the password is set', () => {
      expect(store().canDecrypt('sheets')).toBe(true);
    });

    it('should be false when the password is unset or empty', () => {
      expect(store({}).canDecrypt('sheets')).toBe(false);
      expect(store({ SHEETS_PASSWORD: '' }).canDecrypt('sheets')).toBe(false);
    });

    it('should be false when the cipher is missing', () => {
      const noCipher = new SecretStore({ env: PASSWORD_ENV, rootFor: () => testDir, cipherAvailable: () => false });

      expect(noCipher.canDecrypt('sheets')).toBe(false);
      expect(noCipher.skipUnlessDecryptable('sheets')).toBe('aes-256-gcm is not available in this runtime');
    });

    it('should never throw, even when the environment does', () => {
      const broken = new SecretStore({
        env: () => {
          throw new Error('environment unavailable');
        },
      });

      expect(broken.canDecrypt('sheets')).toBe(false);
    });
  });

  describe('write / read', () => {
    it('should round-trip the exact bytes', () => {
      const data = Buffer.from([0, 1, 2, 254, 255, 10, 13]);
      const secrets = store();

      secrets.write('sheets', 'service-account.json', data);

      expect(secrets.read('sheets', 'service-account.json').equals(data)).toBe(true);
    });

    it('should persist a single versioned line under secret/', () => {
      const path = store().write('sheets', 'token', Buffer.from('hello'));

      expect(path).toBe(join(testDir, 'secret', 'token'));
      const content = readFileSync(path, 'utf-8');
      expect(content).toMatch(/^authbroker:v1:[0-9a-f]{24}:[0-9a-f]{42}\n$/);
    });

    it('should use a fresh nonce per write', () => {
      const secrets = store();
      const first = readFileSync(secrets.write('sheets', 'a', Buffer.from('same')), 'utf-8');
      const second = readFileSync(secrets.write('sheets', 'b', Buffer.from('same')), 'utf-8');

      expect(first).not.toBe(second);
    });

    it('should read a file path given as a string', () => {
      const source = join(testDir, 'plain.json');
      writeFileSync(source, '{"type":"service_account"}');
      const secrets = store();

      secrets.write('sheets', 'key.json', source);

      expect(secrets.read('sheets', 'key.json').toString('utf8')).toBe('{"type":"service_account"}');
    });

    it('should refuse to write without a password', () => {
      expect(() => store({}).write('sheets', 'token', Buffer.from('x'))).toThrow(PasswordUnavailableError);
      expect(() => store({}).write('sheets', 'token', Buffer.from('x'))).toThrow(
        'Environment variable SHEETS_PASSWORD is not set; cannot encrypt'
      );
    });

    it('should fail read without touching the filesystem when decryption is unavailable', () => {
      const rootFor = vi.fn(() => testDir);
      const secrets = new SecretStore({ env: {}, rootFor });

      const error = (() => {
        try {
          secrets.read('sheets', 'token');
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(DecryptionUnavailableError);
      expect(isDecryptionUnavailable(error)).toBe(true);
      if (error instanceof DecryptionUnavailableError) {
        expect(error.message).toBe('Secrets cannot be decrypted: SHEETS_PASSWORD is not set');
        expect(error.envVar).toBe('SHEETS_PASSWORD');
      }
      expect(rootFor).not.toHaveBeenCalled();
    });

    it('should fail authentication with the wrong password', () => {
      store().write('sheets', 'token', Buffer.from('hello'));

      expect(() => store({ SHEETS_PASSWORD: 'another-secret' }).read('sheets', 'token')).toThrow(DecryptionFailedError);
    });

    it('should detect a tampered ciphertext', () => {
      const path = store().write('sheets', 'token', Buffer.from('hello'));
      const content = readFileSync(path, 'utf-8').trim();
      const flipped = content.slice(0, -1) + (content.endsWith('0') ? '1' : '0');
      writeFileSync(path, flipped);

      expect(() => store().read('sheets', 'token')).toThrow(DecryptionFailedError);
    });

    it('should reject a file in another layout', () => {
      mkdirSync(join(testDir, 'secret'), { recursive: true });
      writeFileSync(join(testDir, 'secret', 'token'), 'plain text');

      expect(() => store().read('sheets', 'token')).toThrow(SecretFormatError);
    });

    it('should report a missing secret as a format error', () => {
      expect(() => store().read('sheets', 'absent')).toThrow(SecretFormatError);
    });

    it('should reject names that leave the secret directory', () => {
      expect(() => store().secretPath('sheets', '../escape')).toThrow(ConfigurationError);
      expect(() => store().secretPath('sheets', '..')).toThrow(ConfigurationError);
    });
  });

  describe('skipUnlessDecryptable', () => {
    it('should give the reason to skip, or undefined', () => {
      expect(store({}).skipUnlessDecryptable('sheets')).toBe('SHEETS_PASSWORD is not set');
      expect(store().skipUnlessDecryptable('sheets')).toBeUndefined();
    });
  });

  describe('serialized layout', () => {
    it('should reject a nonce of the wrong size', () => {
      expect(() => parseSecret('authbroker:v1:abcd:00112233445566778899aabbccddeeff')).toThrow(
        'Nonce must be 12 bytes, got 2'
      );
    });

    it('should reject a ciphertext shorter than its tag', () => {
      const key = Buffer.alloc(32, 1);
      const secret = parseSecret(serializeSecret({ nonce: Buffer.alloc(12), ciphertext: Buffer.alloc(4) }));

      expect(() => decryptBytes(secret, key)).toThrow('Ciphertext is shorter than its authentication tag');
    });

    it('should append a sixteen-byte tag', () => {
      const secret = encryptBytes(Buffer.from('abc'), Buffer.alloc(32, 7), Buffer.alloc(12, 3));

      expect(secret.ciphertext.length).toBe(3 + 16);
      expect(decryptBytes(secret, Buffer.alloc(32, 7)).toString()).toBe('abc');
    });
  });

  describe('packageRoot', () => {
    it('should use the working directory when it is the package', () => {
      writeFileSync(join(testDir, 'package.json'), JSON.stringify({ name: 'fixture-pkg' }));

      expect(packageRoot('fixture-pkg', testDir)).toBe(testDir);
    });

    it('should fail for a package that cannot be found', () => {
      expect(() => packageRoot('no-such-package-for-authbroker-tests', testDir)).toThrow(
        'Cannot locate the root of package no-such-package-for-authbroker-tests'
      );
    });
  });
});
