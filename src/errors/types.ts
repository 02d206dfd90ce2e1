/**
 * Base error class for all telemetry errors
 */
export class TelemetryError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;
  public readonly cause: Error | undefined;
  public readonly isTelemetryError = true;

  constructor(
    message: string,
    code: string,
    options: {
      details?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (this.cause && this.cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${this.cause.stack}`;
    }
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: this.stack,
    };

    if (this.details !== undefined) {
      result['details'] = this.details;
    }

    if (this.cause !== undefined) {
      result['cause'] = this.cause instanceof TelemetryError ? this.cause.toJSON() : this.cause;
    }

    return result;
  }
}

export type LifecycleErrorCode = 'ALREADY_INITIALIZED' | 'NOT_INITIALIZED';

/**
 * Misuse of the init/shutdown lifecycle
 */
export class LifecycleError extends TelemetryError {
  declare readonly code: LifecycleErrorCode;

  constructor(message: string, code: LifecycleErrorCode, options: { details?: Record<string, unknown> } = {}) {
    super(message, code, options);
  }
}

/**
 * A required ping builder type has not been registered
 */
export class MissingPingBuilderError extends TelemetryError {
  constructor(
    message: string,
    public readonly pingTypes: string[],
    options: { details?: Record<string, unknown> } = {}
  ) {
    super(message, 'MISSING_PING_BUILDER', {
      details: { ...options.details, pingTypes },
    });
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends TelemetryError {
  public readonly configPath: string | undefined;

  constructor(
    message: string,
    configPath?: string,
    options: { cause?: Error; details?: Record<string, unknown> } = {}
  ) {
    const errorOptions = {
      ...options,
      ...(options.details !== undefined || configPath !== undefined ? {
        details: {
          ...options.details,
          ...(configPath !== undefined ? { configPath } : {}),
        }
      } : {}),
    };

    super(message, 'CONFIG_ERROR', errorOptions);
    this.configPath = configPath;
  }
}

/**
 * Validation errors
 */
export class ValidationError extends TelemetryError {
  public readonly field: string | undefined;
  public readonly value: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    options: { cause?: Error; details?: Record<string, unknown> } = {}
  ) {
    const errorOptions = {
      ...options,
      ...(options.details !== undefined || field !== undefined || value !== undefined ? {
        details: {
          ...options.details,
          ...(field !== undefined ? { field } : {}),
          ...(value !== undefined ? { value } : {}),
        }
      } : {}),
    };

    super(message, 'VALIDATION_ERROR', errorOptions);
    this.field = field;
    this.value = value;
  }
}

/**
 * Type guard to check if an error is a TelemetryError
 */
export function isTelemetryError(error: unknown): error is TelemetryError {
  if (error instanceof TelemetryError) {
    return true;
  }
  return typeof error === 'object' && error !== null &&
    'isTelemetryError' in error && error.isTelemetryError === true;
}

/**
 * Type guard to check if an error is a specific TelemetryError type
 */
export function isErrorOfType<T extends TelemetryError>(
  error: unknown,
  errorType: abstract new (...args: never[]) => T
): error is T {
  if (error instanceof errorType) {
    return true;
  }
  return isTelemetryError(error) && error.name === errorType.name;
}
