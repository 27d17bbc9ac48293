import { ClidefError, ErrorSeverity } from './ClidefError';

/**
 * Structural problems in a specification document or tree.
 */
export class SpecValidationError extends ClidefError {
  constructor(public readonly issues: string[], source?: string) {
    const header = source ? `invalid specification ${source}` : 'invalid specification';
    super(issues.length === 1 ? `${header}: ${issues[0]}` : `${header}:\n  - ${issues.join('\n  - ')}`, {
      code: 'SPEC_INVALID',
      severity: ErrorSeverity.Fatal,
      location: source,
      details: { issues }
    });
  }
}
