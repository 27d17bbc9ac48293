import { ClidefError, ErrorSeverity } from './ClidefError';

/**
 * Positional argument count outside the command's arity rule.
 */
export class ArgumentCountError extends ClidefError {
  constructor(message: string, command: string) {
    super(message, {
      code: 'ARGUMENT_COUNT',
      severity: ErrorSeverity.Fatal,
      location: `command "${command}"`
    });
  }
}

/**
 * Required flags with no value from the command line, environment or default.
 */
export class RequiredFlagError extends ClidefError {
  constructor(message: string, command: string, public readonly flags: string[]) {
    super(message, {
      code: 'REQUIRED_FLAG',
      severity: ErrorSeverity.Fatal,
      location: `command "${command}"`,
      details: { flags }
    });
  }
}
