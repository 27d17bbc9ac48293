import type { Specification } from '@core/types/spec';

export interface ValidationResult {
  errors: string[];
  /** Suspicious but runnable, e.g. a required arg after an optional one */
  warnings: string[];
}

export type SpecValidator = (spec: Specification, result: ValidationResult) => void;

export interface IValidationService {
  /**
   * Run every registered validator and collect their findings
   */
  validate(spec: Specification): ValidationResult;

  /**
   * Validate and throw when any error was found; warnings are logged
   * @throws {SpecValidationError} If validation fails
   */
  assertValid(spec: Specification, source?: string): void;

  /**
   * Register a validator under a name, replacing any previous one
   */
  registerValidator(name: string, validator: SpecValidator): void;

  removeValidator(name: string): void;

  hasValidator(name: string): boolean;
}
