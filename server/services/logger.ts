/**
 * Pipeline logger
 *
 * Pretty single-line output in development, one JSON object per line in
 * production. Messages below the threshold (`LOG_LEVEL`, default `info`)
 * are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  operation: string;
  message: string;
  context?: LogContext;
  error?: { name: string; message: string; stack?: string };
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_EMOJI: Record<LogLevel, string> = { debug: '🔍', info: '📋', warn: '⚠️', error: '❌' };

const CONSOLE_METHOD = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
} as const satisfies Record<LogLevel, keyof Console>;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_RANK, value);
}

const envLevel = process.env.LOG_LEVEL;

/** Logger bound to one document; every line carries `doc:<filename>`. */
export interface DocumentLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

class LoggerService {
  private readonly pretty = process.env.NODE_ENV !== 'production';
  private threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

  /** Change the minimum level at runtime (CLI, tests). */
  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  private format(entry: LogEntry): string {
    if (!this.pretty) return JSON.stringify(entry);

    const { level, operation, message, context, error } = entry;
    let output = `${LEVEL_EMOJI[level]} [${operation}] ${message}`;
    if (context && Object.keys(context).length > 0) output += ` ${JSON.stringify(context)}`;
    if (error) {
      output += `\n  Error: ${error.message}`;
      if (error.stack && level === 'error') {
        output += `\n  ${error.stack.split('\n').slice(1, 4).join('\n  ')}`;
      }
    }
    return output;
  }

  private log(level: LogLevel, operation: string, message: string, context?: LogContext, error?: Error): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;

    const entry: LogEntry = { level, timestamp: new Date().toISOString(), operation, message, context };
    if (error) entry.error = { name: error.name, message: error.message, stack: error.stack };

    console[CONSOLE_METHOD[level]](this.format(entry));
  }

  debug(operation: string, message: string, context?: LogContext): void {
    this.log('debug', operation, message, context);
  }

  info(operation: string, message: string, context?: LogContext): void {
    this.log('info', operation, message, context);
  }

  warn(operation: string, message: string, context?: LogContext): void {
    this.log('warn', operation, message, context);
  }

  error(operation: string, message: string, context?: LogContext, error?: Error): void {
    this.log('error', operation, message, context, error);
  }

  forDocument(filename: string): DocumentLogger {
    const operation = filename ? `doc:${filename}` : 'doc';
    return {
      debug: (message, context) => this.debug(operation, message, context),
      info: (message, context) => this.info(operation, message, context),
      warn: (message, context) => this.warn(operation, message, context),
      error: (message, context, error) => this.error(operation, message, context, error),
    };
  }
}

export const logger = new LoggerService();
