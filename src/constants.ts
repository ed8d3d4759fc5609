/**
 * Centralized constants for authbroker.
 *
 * Endpoints, hosts and timeouts live here so strategies and tests share
 * a single source of truth.
 */

// ==================== Google OAuth ====================

/**
 * Google OAuth hosts and endpoints.
 */
export const GOOGLE_OAUTH = {
  /** Host of the Google authorization server that externally supplied tokens must name */
  AUTH_HOST: 'accounts.google.com',
  /** Token endpoint for grants */
  TOKEN_URI: 'https://oauth2.googleapis.com/token',
  /** Token introspection endpoint */
  TOKENINFO_URI: 'https://oauth2.googleapis.com/tokeninfo',
  /** Grant type for service-account JWT assertions */
  JWT_BEARER_GRANT: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
  /** Scope needed for the email to appear in token info */
  USERINFO_EMAIL_SCOPE: 'https://www.googleapis.com/auth/userinfo.email',
  /** Scope used when a strategy is asked for none */
  CLOUD_PLATFORM_SCOPE: 'https://www.googleapis.com/auth/cloud-platform',
} as const;

// ==================== Metadata server ====================

export const METADATA_SERVER = {
  /** Default host when GCE_METADATA_HOST is unset */
  DEFAULT_HOST: 'metadata.google.internal',
  /** Header required on every request and echoed on every response */
  FLAVOR_HEADER: 'Metadata-Flavor',
  FLAVOR_VALUE: 'Google',
  /** Service account whose token is requested by default */
  DEFAULT_ACCOUNT: 'default',
} as const;

// ==================== Environment variables ====================

export const ENV_VARS = {
  APPLICATION_CREDENTIALS: 'GOOGLE_APPLICATION_CREDENTIALS',
  ACCESS_TOKEN: 'GOOGLE_OAUTH_ACCESS_TOKEN',
  METADATA_HOST: 'GCE_METADATA_HOST',
  LOG_LEVEL: 'AUTHBROKER_LOG_LEVEL',
  OAUTH_EMAIL: 'AUTHBROKER_OAUTH_EMAIL',
  OAUTH_CACHE: 'AUTHBROKER_OAUTH_CACHE',
  FAILURE_POLICY: 'AUTHBROKER_FAILURE_POLICY',
} as const;

// ==================== Timeouts ====================

/**
 * Timeout values in milliseconds.
 */
export const TIMEOUTS = {
  /** Default HTTP request timeout (30 seconds) */
  DEFAULT: 30000,
  /** Metadata server detection probe (500ms) */
  METADATA_PROBE: 500,
  /** Seconds before expiry at which a token already counts as expired */
  EXPIRY_SKEW_SECONDS: 60,
  /** Lifetime requested for service-account assertions (1 hour) */
  JWT_LIFETIME_SECONDS: 3600,
} as const;

// ==================== Secrets ====================

export const SECRETS = {
  /** Directory under the package root holding encrypted files */
  DIR: 'secret',
  /** Prefix of the serialized layout, including its version */
  PREFIX: 'authbroker:v1',
  CIPHER: 'aes-256-gcm',
  NONCE_BYTES: 12,
  TAG_BYTES: 16,
  KEY_BYTES: 32,
} as const;

// ==================== Paths ====================

export const PATHS = {
  /** Directory name under the home directory for user config */
  CONFIG_DIR: '.authbroker',
  /** Default user grant cache, relative to the home directory */
  OAUTH_CACHE_DIR: '.cache/authbroker',
  /** gcloud's well-known application default credentials file */
  GCLOUD_ADC_FILE: 'application_default_credentials.json',
} as const;
