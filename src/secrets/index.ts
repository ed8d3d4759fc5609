export {
  SecretStore,
  passwordName,
  packageRoot,
  isCipherAvailable,
  type Environment,
  type EnvironmentSource,
  type EncryptedSecret,
  type SecretStoreOptions,
} from './store.js';
export { makeKey, hasKey, encryptJson, decryptJson } from './json.js';
