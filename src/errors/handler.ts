import {
  TelemetryError,
  isTelemetryError,
  isErrorOfType,
  ConfigError,
  LifecycleError,
  MissingPingBuilderError,
  ValidationError,
} from './types';
import { Logger, NullLogger } from '../logger';

export interface ErrorHandlerOptions {
  /**
   * Logger instance for error reporting
   */
  logger?: Logger;

  /**
   * Whether to include error stack traces in output
   * @default false in production, true in development
   */
  includeStack?: boolean;

  /**
   * Whether to include error details in output
   * @default true
   */
  includeDetails?: boolean;

  /**
   * Whether to log errors
   * @default true
   */
  logErrors?: boolean;
}

export interface FormattedError {
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Normalizes and reports errors raised by telemetry operations
 */
export class ErrorHandler {
  private readonly options: Required<ErrorHandlerOptions>;

  constructor(options: ErrorHandlerOptions = {}) {
    const isDev = process.env['NODE_ENV'] !== 'production';

    this.options = {
      logger: new NullLogger(),
      includeStack: isDev,
      includeDetails: true,
      logErrors: true,
      ...options,
    };
  }

  /**
   * Normalize an error, log it, and return the normalized form.
   * `context` is merged into the details of errors that did not originate here.
   */
  handle(error: unknown, context: Record<string, unknown> = {}): TelemetryError {
    const telemetryError = this.normalizeError(error, context);

    if (this.options.logErrors) {
      this.logError(telemetryError);
    }

    return telemetryError;
  }

  /**
   * Convert any thrown value to a TelemetryError
   */
  normalizeError(error: unknown, context: Record<string, unknown> = {}): TelemetryError {
    if (isTelemetryError(error)) {
      return error;
    }

    const details = Object.keys(context).length > 0 ? { details: context } : {};

    if (error instanceof Error) {
      return new TelemetryError(error.message, 'UNKNOWN_ERROR', { cause: error, ...details });
    }

    return new TelemetryError(
      typeof error === 'string' ? error : 'An unknown error occurred',
      'UNKNOWN_ERROR',
      { details: { ...context, original: error } }
    );
  }

  /**
   * Format an error for display
   */
  formatError(error: TelemetryError): FormattedError {
    let message: string;
    let details: Record<string, unknown> = {};

    if (isErrorOfType(error, LifecycleError)) {
      message = `Lifecycle Error: ${error.message}`;
    } else if (isErrorOfType(error, MissingPingBuilderError)) {
      message = `Missing Ping Builder: ${error.message}`;
    } else if (isErrorOfType(error, ConfigError)) {
      message = `Configuration Error: ${error.message}`;
      if (error.configPath) {
        details['configPath'] = error.configPath;
      }
    } else if (isErrorOfType(error, ValidationError)) {
      message = `Validation Error: ${error.message}`;
      if (error.field) details['field'] = error.field;
    } else {
      message = `Error: ${error.message}`;
    }

    if (this.options.includeDetails && error.details) {
      details = { ...details, ...error.details };
    }

    if (this.options.includeStack && error.stack) {
      details['stack'] = error.stack;
    }

    return {
      message,
      ...(Object.keys(details).length > 0 ? { details } : {}),
    };
  }

  private logError(error: TelemetryError): void {
    const { logger } = this.options;
    const { message, details } = this.formatError(error);

    logger.error(message);

    if (details) {
      logger.error('Error details:', details);
    }
  }
}

/**
 * Create an error handler instance
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler {
  return new ErrorHandler(options);
}
