import { ClidefError, ErrorSeverity } from './ClidefError';

/**
 * Error thrown when output data does not fit the requested format, or the
 * format itself is not supported.
 */
export class RenderError extends ClidefError {
  public readonly format: string;

  constructor(message: string, format: string) {
    super(message, {
      code: 'OUTPUT_RENDER_FAILED',
      severity: ErrorSeverity.Fatal,
      details: { format }
    });
    this.format = format;
  }
}
