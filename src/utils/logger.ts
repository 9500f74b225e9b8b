export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Shared between a logger and its children so that `setMinLevel`
 * on the root applies everywhere.
 */
interface LevelState {
  minLevel: LogLevel;
}

function levelFromEnv(): LogLevel {
  const logLevelEnv = process.env.LOG_LEVEL?.toUpperCase();
  const configured = LEVELS.find(level => level === logLevelEnv);

  if (configured) {
    return configured;
  }

  const env = process.env.NODE_ENV || 'development';
  if (env === 'production') return LogLevel.INFO;
  if (env === 'test') return LogLevel.ERROR;
  return LogLevel.DEBUG;
}

export class Logger {
  constructor(
    private readonly state: LevelState = { minLevel: levelFromEnv() },
    private readonly scope?: string
  ) {}

  /**
   * Logger whose messages are prefixed with `[scope]`
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  getMinLevel(): LogLevel {
    return this.state.minLevel;
  }

  setMinLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  private format(entry: LogEntry): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    const base = `[${entry.timestamp}] [${entry.level}]${scope} ${entry.message}`;

    if (entry.meta !== undefined) {
      const metaStr = typeof entry.meta === 'object'
        ? JSON.stringify(entry.meta, null, 2)
        : String(entry.meta);
      return `${base}\n${metaStr}`;
    }

    return base;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.minLevel);
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    console.log(this.format({ timestamp: new Date().toISOString(), level: LogLevel.DEBUG, message, meta }));
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    console.log(this.format({ timestamp: new Date().toISOString(), level: LogLevel.INFO, message, meta }));
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(this.format({ timestamp: new Date().toISOString(), level: LogLevel.WARN, message, meta }));
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    let meta: unknown = error;

    if (error instanceof Error) {
      meta = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    console.error(this.format({ timestamp: new Date().toISOString(), level: LogLevel.ERROR, message, meta }));
  }
}

export const logger = new Logger();
