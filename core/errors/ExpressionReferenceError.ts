import { ClidefError, ErrorSeverity, type BaseErrorDetails } from './ClidefError';
import type { Namespace } from '@core/types/spec';

export const ReferenceErrorCode: Record<Namespace, string> = {
  flag: 'UNKNOWN_FLAG',
  arg: 'UNKNOWN_ARG',
  step: 'UNKNOWN_STEP'
};

export interface ExpressionReferenceErrorDetails extends BaseErrorDetails {
  /** Names that were resolvable at that point */
  available: string[];
}

/**
 * A flag, arg or step reference that names nothing in scope.
 * Fatal to the whole translation or evaluation.
 */
export class ExpressionReferenceError extends ClidefError<ExpressionReferenceErrorDetails> {
  constructor(
    public readonly namespace: Namespace,
    public readonly identifier: string,
    available: string[],
    site?: string
  ) {
    super(`unknown ${namespace} "${identifier}"${site ? ` (in ${site})` : ''}`, {
      code: ReferenceErrorCode[namespace],
      severity: ErrorSeverity.Fatal,
      location: site,
      details: { available }
    });
  }
}
