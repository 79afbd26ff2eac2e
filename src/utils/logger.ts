import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

interface SharedState {
  level: LogLevel;
}

class Logger {
  private readonly state: SharedState;
  private readonly scope?: string;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
  };

  constructor(state: SharedState = { level: 'info' }, scope?: string) {
    this.state = state;
    this.scope = scope;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  /** Scoped logger; level changes on either side apply to both. */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return this.levels[level] >= this.levels[this.state.level];
  }

  private formatMessage(level: Exclude<LogLevel, 'silent'>, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 19);
    const prefix = chalk.dim(`[${timestamp}]`);
    const body = this.scope ? `${chalk.cyan(`[${this.scope}]`)} ${message}` : message;

    switch (level) {
      case 'debug':
        return `${prefix} ${chalk.gray('DEBUG')} ${body}`;
      case 'info':
        return `${prefix} ${chalk.blue('INFO')} ${body}`;
      case 'warn':
        return `${prefix} ${chalk.yellow('WARN')} ${body}`;
      case 'error':
        return `${prefix} ${chalk.red('ERROR')} ${body}`;
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message), ...args);
    }
  }
}

export type { Logger };

export const logger = new Logger();
