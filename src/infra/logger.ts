/**
 * Structured console logger.
 *
 * Readable single lines in development, JSON lines when NODE_ENV=production.
 * Level comes from LOG_LEVEL (debug | info | warn | error | silent). Both can
 * be changed at run time with `configureLogging`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly service: string;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return level;
  }
  return 'info';
}

export function isPrettyEnv(nodeEnv: string | undefined): boolean {
  return nodeEnv !== 'production';
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
let pretty = isPrettyEnv(process.env.NODE_ENV);

/** Applies to every logger, including child loggers created earlier. */
export function configureLogging(options: { level?: LogLevel; pretty?: boolean }): void {
  if (options.level !== undefined) currentLevel = options.level;
  if (options.pretty !== undefined) pretty = options.pretty;
}

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[currentLevel];
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.format('error', message, metadata));
  }
}

export const logger = new Logger({ service: 'parking' });

export function createLogger(module: string): Logger {
  return logger.child(module);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
