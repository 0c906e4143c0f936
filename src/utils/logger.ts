/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  /** Prefix printed in brackets before each message, e.g. "sweeper" */
  scope?: string;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const LEVEL_EMOJI: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🔍',
  [LogLevel.INFO]: 'ℹ️',
  [LogLevel.SUCCESS]: '✅',
  [LogLevel.WARNING]: '⚠️',
  [LogLevel.ERROR]: '❌',
  [LogLevel.HIGHLIGHT]: '🌟',
};

/**
 * Parse a config level name ("debug", "warning", ...) into a LogLevel
 */
export function parseLogLevel(name: string): LogLevel {
  const level = LEVEL_ORDER.find((l) => l === name.toUpperCase());
  if (!level) {
    throw new Error(`Unknown log level: "${name}"`);
  }
  return level;
}

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;
  private parent?: Logger;

  constructor(config: Partial<LoggerConfig> = {}, parent?: Logger) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
      scope: config.scope,
    };
    this.parent = parent;
  }

  /**
   * Create a logger that prefixes messages with a scope and shares this logger's level
   */
  child(scope: string): Logger {
    const fullScope = this.config.scope ? `${this.config.scope}:${scope}` : scope;
    return new Logger({ ...this.config, scope: fullScope }, this.parent ?? this);
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    const hour = date.getHours().toString().padStart(2, '0');
    const min = date.getMinutes().toString().padStart(2, '0');
    const sec = date.getSeconds().toString().padStart(2, '0');
    return `${month}-${day} ${hour}:${min}:${sec}`;
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = this.formatDate(new Date());
    const scope = this.config.scope ? `[${this.config.scope}] ` : '';
    return `${timestamp} ${LEVEL_EMOJI[level]} ${scope}${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  debug(message: string): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.format(LogLevel.DEBUG, this.colorize(message, colors.dim)));
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.format(LogLevel.INFO, this.colorize(message, colors.blue)));
    }
  }

  success(message: string): void {
    if (this.shouldLog(LogLevel.SUCCESS)) {
      console.log(this.format(LogLevel.SUCCESS, this.colorize(message, colors.green)));
    }
  }

  warning(message: string): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      console.log(this.format(LogLevel.WARNING, this.colorize(message, colors.yellow)));
    }
  }

  error(message: string): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.format(LogLevel.ERROR, this.colorize(message, colors.red)));
    }
  }

  highlight(message: string): void {
    if (this.shouldLog(LogLevel.HIGHLIGHT)) {
      console.log(this.format(LogLevel.HIGHLIGHT, this.colorize(message, colors.bright + colors.magenta)));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.getLevel());
  }

  /**
   * Effective level; scoped children follow their root logger
   */
  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.config.level;
  }

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.config.level = level;
  }

  setUseColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
