import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

/**
 * Log levels supported by authbroker.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: 'warn', 'silent' under test) */
  level?: LogLevel;
  /** Output file path (default: stdout) */
  file?: string;
  /** Enable pretty printing for development */
  pretty?: boolean;
  /** Include timestamps in output */
  timestamp?: boolean;
  /** Component name for context */
  name?: string;
}

/**
 * Default configuration.
 * A library should stay quiet unless asked, so the default level is 'warn'.
 */
const DEFAULT_CONFIG: Required<Omit<LoggerConfig, 'file' | 'name'>> = {
  level: IS_TEST_ENV ? 'silent' : 'warn',
  pretty: false,
  timestamp: true,
};

let globalLogger: PinoLogger | null = null;
const children = new Map<string, PinoLogger>();
let savedLogLevel: string | null = null;

/**
 * Create a new logger instance.
 */
export function createLogger(config: LoggerConfig = {}): PinoLogger {
  const level = config.level ?? DEFAULT_CONFIG.level;
  const pretty = config.pretty ?? DEFAULT_CONFIG.pretty;
  const timestamp = config.timestamp ?? DEFAULT_CONFIG.timestamp;

  const options: LoggerOptions = {
    level,
    name: config.name,
    timestamp: timestamp ? pino.stdTimeFunctions.isoTime : false,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ['accessToken', 'refreshToken', 'apiKey', 'password', '*.accessToken', '*.refreshToken'],
      censor: '[redacted]',
    },
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  if (config.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

/**
 * Get or create the global logger, optionally as a named child.
 * Children are cached per name until the root is replaced, so callers look
 * them up when they log rather than holding one.
 */
export function getLogger(name?: string): PinoLogger {
  if (!globalLogger) {
    globalLogger = createLogger({ level: DEFAULT_CONFIG.level });
  }

  if (name) {
    let child = children.get(name);
    if (!child) {
      child = globalLogger.child({ component: name });
      children.set(name, child);
    }
    return child;
  }

  return globalLogger;
}

/**
 * Configure the global logger. Named children are rebuilt from it on next use.
 */
export function configureLogger(config: LoggerConfig): void {
  globalLogger = createLogger(config);
  savedLogLevel = null;
  children.clear();
}

/**
 * Reset the global logger (for testing).
 */
export function resetLogger(): void {
  globalLogger = null;
  savedLogLevel = null;
  children.clear();
}

function setChildLevels(level: string): void {
  for (const child of children.values()) {
    child.level = level;
  }
}

/**
 * Temporarily suppress all logging. Call restoreLogLevel() to undo.
 */
export function suppressLogs(): void {
  const logger = getLogger();
  if (savedLogLevel === null) {
    savedLogLevel = logger.level;
    logger.level = 'silent';
    setChildLevels('silent');
  }
}

export function restoreLogLevel(): void {
  if (globalLogger && savedLogLevel !== null) {
    globalLogger.level = savedLogLevel;
    setChildLevels(savedLogLevel);
    savedLogLevel = null;
  }
}

/**
 * Mask a secret for log output, keeping a short prefix as a hint.
 *
 * @example
 * maskSecret('ya29.a0AfH6SM') // 'ya29…(13)'
 */
export function maskSecret(value: string | undefined, visible = 4): string {
  if (!value) {
    return '<none>';
  }
  if (value.length <= visible) {
    return `…(${value.length})`;
  }
  return `${value.slice(0, visible)}…(${value.length})`;
}

export type { PinoLogger as Logger };
