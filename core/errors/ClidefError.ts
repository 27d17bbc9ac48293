/**
 * Defines the severity levels for clidef errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for error details.
 * Specific error types extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a ClidefError instance.
 */
export interface ClidefErrorOptions<TDetails extends BaseErrorDetails = BaseErrorDetails> {
  code: string;
  severity: ErrorSeverity;
  details?: TDetails;
  /** Where in the specification the problem sits, e.g. `command "kv get" step "read" url` */
  location?: string;
  cause?: unknown;
}

/**
 * Base class for all custom clidef errors.
 * Provides structure for error codes, severity, details, and the specification
 * location the error refers to.
 */
export class ClidefError<TDetails extends BaseErrorDetails = BaseErrorDetails> extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: TDetails;
  public readonly location?: string;

  constructor(message: string, options: ClidefErrorOptions<TDetails>) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.location = options.location;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings can be reported as warnings.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.location) {
      result += ` at ${this.location}`;
    }
    result += ` (Severity: ${this.severity})`;
    return result;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.location) {
      result.location = this.location;
    }

    return result;
  }
}

/**
 * Message of any thrown value, for wrapping foreign errors.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
