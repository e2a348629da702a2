// lib/logger.ts

import { env } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = unknown;

/**
 * Where formatted lines end up. `console` satisfies it; tests pass a recorder.
 */
export interface LogSink {
  log(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  enabled?: boolean;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const getDefaultLogLevel = (): LogLevel => {
  const envLevel = env.get('OTF_LOG_LEVEL');
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  if (env.isProduction()) {
    return 'warn';
  }
  return 'info';
};

const getDefaultEnabled = (): boolean => {
  // Quiet under Jest unless explicitly switched on
  return env.isTest()
    ? env.get('OTF_ENABLE_LOGGING') === 'true'
    : env.get('OTF_ENABLE_LOGGING') !== 'false';
};

export class Logger {
  private enabled: boolean;
  private currentLevel: LogLevel;
  private readonly sink: LogSink;
  private timers = new Map<string, number>();

  constructor(options: LoggerOptions = {}) {
    this.enabled = options.enabled ?? getDefaultEnabled();
    this.currentLevel = options.level ?? getDefaultLogLevel();
    this.sink = options.sink ?? console;
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[this.currentLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    if (context && typeof context === 'object' && Object.keys(context).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(context)}`;
    }
    return `${prefix} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      this.sink.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      this.sink.info(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      this.sink.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.shouldLog('error')) {
      const base: Record<string, unknown> = {};
      if (context && typeof context === 'object') Object.assign(base, context);
      if (error instanceof Error) {
        base['errorName'] = error.name;
        base['errorMessage'] = error.message;
      } else if (typeof error !== 'undefined') {
        base['error'] = error;
      }
      this.sink.error(this.formatMessage('error', message, base));
    }
  }

  time(label: string): void {
    if (this.shouldLog('debug')) {
      this.timers.set(label, performance.now());
    }
  }

  timeEnd(label: string): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) return;
    this.timers.delete(label);
    if (this.shouldLog('debug')) {
      const duration = performance.now() - startTime;
      this.sink.log(this.formatMessage('debug', `[TIMER] ${label}: ${duration.toFixed(2)}ms`));
    }
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getStatus(): { enabled: boolean; level: LogLevel } {
    return {
      enabled: this.enabled,
      level: this.currentLevel,
    };
  }
}

// Usage:
// const logger = new Logger({ level: 'debug' });
// logger.debug('Dispatching request', { method: 'GET', url });
// logger.error('Bootstrap failed', error, { username });
