import { ClidefError, ErrorSeverity, errorMessage } from './ClidefError';

/**
 * The formatter rejected generated source. Never fatal: the unformatted source
 * is returned next to this error.
 */
export class FormatError extends ClidefError {
  constructor(cause: unknown) {
    super(`failed to format generated source (returning raw): ${errorMessage(cause)}`, {
      code: 'FORMAT_FAILED',
      severity: ErrorSeverity.Warning,
      cause
    });
  }
}
