import { inspect } from 'util';
import * as colors from 'yoctocolors-cjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;

  // Structured logging methods
  logStructured(level: LogLevel, data: LogEntry): void;
  startTrace(operation: string, context?: Record<string, unknown>): TraceContext;
  endTrace(traceContext: TraceContext, result?: 'success' | 'error', error?: Error): void;
}

export interface LogEntry {
  message: string;
  timestamp?: string | undefined;
  level?: string | undefined;
  operation?: string | undefined;
  traceId?: string | undefined;
  duration?: number | undefined;
  context?: Record<string, unknown> | undefined;
  error?: {
    name: string;
    message: string;
    stack?: string | undefined;
  } | undefined;
}

export interface TraceContext {
  traceId: string;
  operation: string;
  startTime: number;
  context?: Record<string, unknown> | undefined;
}

export interface LoggerOptions {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Whether to enable colors in the output
   * @default true
   */
  colors?: boolean;

  /**
   * Whether to include timestamps in the output
   * @default true
   */
  timestamps?: boolean;

  /**
   * Whether to log to stderr for errors
   * @default true
   */
  stderrForErrors?: boolean;

  /**
   * Custom formatter for log messages
   */
  formatter?: (level: LogLevel, message: string, ...args: unknown[]) => string;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: colors.cyan,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
};

/**
 * Parse a log level name, returning undefined for anything unrecognized
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

/**
 * A simple logger with color support and log levels
 */
export class ConsoleLogger implements Logger {
  private readonly levelName: LogLevel;
  private readonly level: number;
  private readonly colors: boolean;
  private readonly timestamps: boolean;
  private readonly stderrForErrors: boolean;
  private readonly formatter: NonNullable<LoggerOptions['formatter']>;

  constructor(options: LoggerOptions = {}) {
    this.levelName = options.level || 'info';
    this.level = LEVELS[this.levelName];
    this.colors = options.colors !== false;
    this.timestamps = options.timestamps !== false;
    this.stderrForErrors = options.stderrForErrors !== false;
    this.formatter = options.formatter || this.defaultFormatter.bind(this);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level > LEVELS.debug) return;
    this.log('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level > LEVELS.info) return;
    this.log('info', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level > LEVELS.warn) return;
    this.log('warn', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level > LEVELS.error) return;
    this.log('error', this.formatError(message, ...args));
  }

  logStructured(level: LogLevel, data: LogEntry): void {
    if (this.level > LEVELS[level]) return;

    const entry: LogEntry = {
      ...data,
      timestamp: data.timestamp || new Date().toISOString(),
      level: data.level || level
    };

    // JSON lines for structured output
    const jsonLine = JSON.stringify(entry);

    if (level === 'error' && this.stderrForErrors) {
      process.stderr.write(jsonLine + '\n');
    } else {
      process.stdout.write(jsonLine + '\n');
    }
  }

  startTrace(operation: string, context?: Record<string, unknown>): TraceContext {
    const traceId = this.generateTraceId();
    const traceContext: TraceContext = {
      traceId,
      operation,
      startTime: Date.now(),
      context
    };

    this.logStructured('debug', {
      message: `Starting operation: ${operation}`,
      operation,
      traceId,
      context
    });

    return traceContext;
  }

  endTrace(traceContext: TraceContext, result: 'success' | 'error' = 'success', error?: Error): void {
    const duration = Date.now() - traceContext.startTime;

    const logData: LogEntry = {
      message: `Completed operation: ${traceContext.operation}`,
      operation: traceContext.operation,
      traceId: traceContext.traceId,
      duration,
      context: traceContext.context
    };

    if (error) {
      logData.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    // Worker units complete constantly; successes stay at debug
    this.logStructured(result === 'error' ? 'error' : 'debug', logData);
  }

  private generateTraceId(): string {
    return Math.random().toString(36).substring(2, 15) +
      Math.random().toString(36).substring(2, 15);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    const formatted = this.formatter(level, message, ...args);

    if (level === 'error' && this.stderrForErrors) {
      process.stderr.write(formatted + '\n');
    } else {
      process.stdout.write(formatted + '\n');
    }
  }

  private defaultFormatter(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = this.timestamps ? this.formatTimestamp() : '';
    const levelStr = this.formatLevel(level);
    const formattedArgs = args.length > 0 ? ' ' + this.formatArgs(args) : '';

    return `${timestamp}${levelStr} ${message}${formattedArgs}`;
  }

  private formatTimestamp(): string {
    const time = new Date().toISOString();

    if (this.colors) {
      return `${colors.gray(time)} `;
    }

    return `[${time}] `;
  }

  private formatLevel(level: LogLevel): string {
    const levelStr = level.toUpperCase().padEnd(5);

    if (this.colors) {
      return LEVEL_COLORS[level](levelStr);
    }

    return `[${levelStr}]`;
  }

  private formatArgs(args: unknown[]): string {
    return args
      .map(arg => {
        if (arg instanceof Error) {
          return arg.stack || arg.message;
        }
        if (typeof arg === 'object' && arg !== null) {
          return inspect(arg, { colors: this.colors, depth: 5 });
        }
        return String(arg);
      })
      .join(' ');
  }

  private formatError(message: string, ...args: unknown[]): string {
    if (args.length > 0 && args[0] instanceof Error) {
      const error = args[0];
      return `${message}: ${error.stack || error.message}`;
    }

    return `${message}${args.length > 0 ? ' ' + this.formatArgs(args) : ''}`;
  }
}

/**
 * A no-op logger that discards all messages
 */
export class NullLogger implements Logger {
  debug(): void { }
  info(): void { }
  warn(): void { }
  error(): void { }

  logStructured(): void { }

  startTrace(operation: string, context?: Record<string, unknown>): TraceContext {
    return {
      traceId: 'null-trace',
      operation,
      startTime: Date.now(),
      context
    };
  }

  endTrace(): void { }
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(options);
}

/**
 * Default logger instance
 */
export const logger = createLogger({
  level: parseLogLevel(process.env['TELEMETRY_LOG_LEVEL']) ?? 'info',
  colors: process.stdout.isTTY === true,
});

/**
 * Create a child logger with the same options but a prefix
 */
export function createChildLogger(parent: Logger, prefix: string): Logger {
  if (parent instanceof ConsoleLogger) {
    const formatter = parent['formatter'];

    return new ConsoleLogger({
      level: parent['levelName'],
      colors: parent['colors'],
      timestamps: parent['timestamps'],
      stderrForErrors: parent['stderrForErrors'],
      formatter: (level, message, ...args) =>
        formatter(level, `[${prefix}] ${message}`, ...args),
    });
  }

  // For other logger types, just return the parent
  return parent;
}
