/**
 * Logging Service
 *
 * Structured logging backed by pino.
 * - Every line carries the module that produced it
 * - The signed-in user ID is attached once known
 * - Credentials are redacted before they reach the destination
 */

import pino from 'pino';

// ============ Types ============

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogModule = 'Auth' | 'API' | 'Storage' | 'Session' | 'App';

export interface ModuleLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, error?: Error | unknown) => void;
}

export interface LoggingOptions {
  level?: LogLevel | 'silent';
  /** Where log lines are written (stdout when omitted) */
  destination?: pino.DestinationStream;
}

const REDACTED_PATHS = [
  'password',
  'token',
  'accessToken',
  'access_token',
  'idToken',
  'id_token',
  '*.password',
  '*.accessToken',
  '*.access_token',
];

const LEVELS: ReadonlyArray<LogLevel | 'silent'> = ['debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(): LogLevel | 'silent' {
  const value = process.env.LOG_LEVEL;
  return LEVELS.find((level) => level === value) ?? 'info';
}

function createRootLogger(options: LoggingOptions): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? levelFromEnv(),
    name: 'auth',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

// ============ Service Implementation ============

class LoggingService {
  private root: pino.Logger;
  private userId: string | null = null;

  constructor(options: LoggingOptions = {}) {
    this.root = createRootLogger(options);
  }

  /**
   * Replace the destination or level. Loggers already handed out pick up
   * the change on their next call.
   */
  configure(options: LoggingOptions): void {
    this.root = createRootLogger(options);
  }

  /**
   * Back to environment defaults with no user attached
   */
  reset(): void {
    this.root = createRootLogger({});
    this.userId = null;
  }

  /**
   * Set the current user ID for log attribution
   */
  setUserId(userId: string | null): void {
    this.userId = userId;
  }

  getUserId(): string | null {
    return this.userId;
  }

  private bindings(module: LogModule): Record<string, unknown> {
    return this.userId ? { module, userId: this.userId } : { module };
  }

  debug(module: LogModule, message: string, data?: Record<string, unknown>): void {
    this.root.debug({ ...this.bindings(module), ...data }, message);
  }

  info(module: LogModule, message: string, data?: Record<string, unknown>): void {
    this.root.info({ ...this.bindings(module), ...data }, message);
  }

  warn(module: LogModule, message: string, data?: Record<string, unknown>): void {
    this.root.warn({ ...this.bindings(module), ...data }, message);
  }

  error(module: LogModule, message: string, error?: Error | unknown): void {
    const err =
      error === undefined || error instanceof Error ? error : new Error(String(error));
    this.root.error({ ...this.bindings(module), err }, message);
  }

  /**
   * Create a module-scoped logger
   * Usage: const log = getLoggingService().createLogger('Auth');
   */
  createLogger(module: LogModule): ModuleLogger {
    return {
      debug: (message: string, data?: Record<string, unknown>) =>
        this.debug(module, message, data),
      info: (message: string, data?: Record<string, unknown>) =>
        this.info(module, message, data),
      warn: (message: string, data?: Record<string, unknown>) =>
        this.warn(module, message, data),
      error: (message: string, error?: Error | unknown) =>
        this.error(module, message, error),
    };
  }
}

// ============ Singleton Factory ============

let instance: LoggingService | null = null;

export function getLoggingService(): LoggingService {
  if (!instance) {
    instance = new LoggingService();
  }
  return instance;
}

export function configureLogging(options: LoggingOptions): void {
  getLoggingService().configure(options);
}

/**
 * Reset the shared service in place, so module loggers created at load
 * time keep writing through it.
 */
export function resetLoggingService(): void {
  instance?.reset();
}

export { LoggingService };
