import { ClidefError, ErrorSeverity, type BaseErrorDetails } from './ClidefError';

export interface BuildErrorDetails extends BaseErrorDetails {
  outputPath?: string;
}

/**
 * The bundler rejected generated source. Carries the captured toolchain output.
 */
export class BuildError extends ClidefError<BuildErrorDetails> {
  constructor(
    /** Diagnostics exactly as the toolchain reported them */
    public readonly output: string,
    outputPath?: string,
    cause?: unknown
  ) {
    super(`build failed${outputPath ? ` for ${outputPath}` : ''}:\n${output}`, {
      code: 'BUILD_FAILED',
      severity: ErrorSeverity.Fatal,
      details: { outputPath },
      cause
    });
  }
}
