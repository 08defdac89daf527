/**
 * Environment-aware logger
 *
 * Usage:
 *   import { createLogger } from './logger';
 *
 *   const log = createLogger('BindingTable');
 *   log.debug('Override registered', { kind: 'link' }); // [BindingTable] Override registered { kind: 'link' }
 *
 *   const parserLog = log.child('Parser'); // [BindingTable:Parser] ...
 *
 * Level resolution:
 *   - MARKDOWN_BINDINGS_LOG_LEVEL, when it names a known level
 *   - otherwise 'warn' when NODE_ENV=production, 'debug' elsewhere
 *
 * Logs are disabled while Vitest runs unless a logger is constructed with
 * `enabled: true`.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_ENV = 'MARKDOWN_BINDINGS_LOG_LEVEL';

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  prefix: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the default level from the process environment.
 * Read on every construction so tests and hosts can change it at runtime.
 */
export function resolveDefaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env[LOG_LEVEL_ENV];
  if (isLogLevel(configured)) {
    return configured;
  }
  return env.NODE_ENV === 'production' ? 'warn' : 'debug';
}

function isTestRun(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.VITEST === 'true';
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      enabled: !isTestRun(),
      level: resolveDefaultLevel(),
      prefix: '',
      ...config
    };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get prefix(): string {
    return this.config.prefix;
  }

  isEnabled(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Logger sharing this one's settings, prefixed `Parent:Child`
   */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix
    });
  }

  /**
   * Time an operation at debug level
   *
   *   const done = log.time('Render document');
   *   emit();
   *   done(); // [Session] Render document: 1.52ms
   */
  time(label: string): () => void {
    if (!this.isEnabled('debug')) {
      return () => {};
    }

    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      console.debug(`${this.format(label)}: ${duration.toFixed(2)}ms`);
    };
  }

  private format(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (!this.isEnabled(level)) return;

    const sink = CONSOLE_SINKS[level];
    if (data !== undefined) {
      sink(this.format(message), data);
    } else {
      sink(this.format(message));
    }
  }
}

const CONSOLE_SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

/**
 * Create a logger with a service prefix
 *
 * @example
 * const log = createLogger('MarkdownParser');
 * log.debug('Capabilities', ['tables']);
 * // [MarkdownParser] Capabilities ['tables']
 */
export function createLogger(prefix?: string): Logger {
  return new Logger({ prefix: prefix ?? '' });
}

export const logger = new Logger();
