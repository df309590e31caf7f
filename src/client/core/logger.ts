/**
 * Console logging with a per-instance threshold. Every line carries the
 * bracketed context of the logger that wrote it, "[control][mapi] ...".
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

const LOG_LEVELS: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const CONSOLE_METHODS = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
} as const satisfies Record<LogLevel, keyof Console>;

export interface LoggerOptions {
  contextName?: string;
  /** Messages below this level are dropped */
  logLevel?: LogLevel;
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLogLevel(level: LogLevel): void;
  setContextName(name: string): void;

  /** Whether a message at `level` would be written */
  isMinLevel(level: LogLevel): boolean;
  /** Logger for a sub-component; inherits this logger's threshold */
  createChildLogger(options: LoggerOptions): ILogger;
}

export function createLogger(options: LoggerOptions = {}): ILogger {
  return new Logger(options.contextName, options.logLevel);
}

function wrapContext(name: string): string {
  return name.startsWith("[") && name.endsWith("]") ? name : `[${name}]`;
}

class Logger implements ILogger {
  private contextName: string;
  private logLevel: LogLevel;

  constructor(contextName: string = "monetdb", logLevel: LogLevel = LogLevel.ERROR) {
    this.contextName = wrapContext(contextName);
    this.logLevel = logLevel;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  setContextName(name: string): void {
    this.contextName = wrapContext(name);
  }

  isMinLevel(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.logLevel];
  }

  createChildLogger(options: LoggerOptions = {}): ILogger {
    const childContextName = options.contextName
      ? `${this.contextName}${wrapContext(options.contextName)}`
      : this.contextName;
    return new Logger(childContextName, options.logLevel ?? this.logLevel);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (this.isMinLevel(level)) {
      console[CONSOLE_METHODS[level]](`${this.contextName} ${message}`, ...args);
    }
  }
}
