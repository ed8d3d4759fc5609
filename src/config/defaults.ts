import { homedir } from 'os';
import { join } from 'path';
import { GOOGLE_OAUTH, PATHS, TIMEOUTS } from '../constants.js';

export const CONFIG_DEFAULTS = {
  logLevel: 'warn' as const,
  oauthCache: join(homedir(), PATHS.OAUTH_CACHE_DIR),
  failurePolicy: 'continue' as const,
  introspectionEndpoint: GOOGLE_OAUTH.TOKENINFO_URI,
  tokenUri: GOOGLE_OAUTH.TOKEN_URI,
  timeoutMs: TIMEOUTS.DEFAULT,
};
