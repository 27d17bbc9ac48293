import { ClidefError, ErrorSeverity, errorMessage, type BaseErrorDetails } from './ClidefError';

export interface StepExecutionErrorDetails extends BaseErrorDetails {
  /** Response status when the server answered with a non-2xx code */
  status?: number;
  aborted: boolean;
}

/**
 * A step whose HTTP call failed (transport error, non-2xx, timeout or
 * cancellation). Truncates the action: no later step and no output runs.
 */
export class StepExecutionError extends ClidefError<StepExecutionErrorDetails> {
  constructor(
    public readonly step: string,
    cause: unknown,
    options: { status?: number; aborted?: boolean } = {}
  ) {
    super(stepFailureMessage(step, errorMessage(cause)), {
      code: 'STEP_EXECUTION_FAILED',
      severity: ErrorSeverity.Fatal,
      location: `step "${step}"`,
      details: { status: options.status, aborted: options.aborted ?? false },
      cause
    });
  }
}

/**
 * Wording shared with generated programs so both backends report step
 * failures alike.
 */
export function stepFailureMessage(step: string, cause: string): string {
  return `step "${step}" failed: ${cause}`;
}
