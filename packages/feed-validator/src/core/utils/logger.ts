/**
 * Structured logging for the engine and the loader
 *
 * Each module gets its own logger, tagged `feed-validator:<module>`. The
 * threshold comes from LOG_LEVEL; records are JSON lines when
 * NODE_ENV=production and one readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * What the engine and loader need from a logger; the CLI logger fits too.
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerOptions {
  /** Defaults to LOG_LEVEL, then `info` */
  readonly level?: LogLevel;
  /** Defaults to true unless NODE_ENV=production */
  readonly pretty?: boolean;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function levelFromEnv(): LogLevel {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : 'info';
}

class ModuleLogger implements Logger {
  constructor(
    private readonly source: string,
    private readonly threshold: LogLevel,
    private readonly pretty: boolean
  ) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (RANK[level] < RANK[this.threshold]) return;
    console[level](this.render(level, message, metadata));
  }

  private render(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const fields = metadata !== undefined && Object.keys(metadata).length > 0 ? metadata : undefined;

    if (this.pretty) {
      const suffix = fields === undefined ? '' : ` ${JSON.stringify(fields)}`;
      return `[${timestamp}] ${level.toUpperCase()} ${this.source}: ${message}${suffix}`;
    }
    return JSON.stringify({ timestamp, level, source: this.source, message, ...fields });
  }
}

/**
 * Logger for one module of the validator
 */
export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  return new ModuleLogger(
    `feed-validator:${module}`,
    options.level ?? levelFromEnv(),
    options.pretty ?? process.env.NODE_ENV !== 'production'
  );
}
