import type { Specification } from '@core/types/spec';
import { SpecValidationError } from '@core/errors';
import { validationLogger as logger } from '@core/utils/logger';
import type { IValidationService, SpecValidator, ValidationResult } from './IValidationService';

// Default validators
import { validateFlags } from './validators/FlagValidator';
import { validateCommands } from './validators/CommandValidator';
import { validateActions } from './validators/ActionValidator';

export class ValidationService implements IValidationService {
  private validators = new Map<string, SpecValidator>();

  constructor() {
    this.registerValidator('flags', validateFlags);
    this.registerValidator('commands', validateCommands);
    this.registerValidator('actions', validateActions);

    logger.debug('ValidationService initialized with default validators', {
      validators: Array.from(this.validators.keys())
    });
  }

  validate(spec: Specification): ValidationResult {
    const result: ValidationResult = { errors: [], warnings: [] };
    for (const [name, validator] of this.validators) {
      validator(spec, result);
      logger.debug('Ran validator', { name, errors: result.errors.length });
    }
    return result;
  }

  assertValid(spec: Specification, source?: string): void {
    const result = this.validate(spec);
    for (const warning of result.warnings) {
      logger.warn(warning, { source });
    }
    if (result.errors.length > 0) {
      logger.error('Specification validation failed', { source, errors: result.errors });
      throw new SpecValidationError(result.errors, source);
    }
  }

  registerValidator(name: string, validator: SpecValidator): void {
    if (!name) {
      throw new Error('Validator name must be a non-empty string');
    }
    this.validators.set(name, validator);
    logger.debug('Registered validator', { name });
  }

  removeValidator(name: string): void {
    this.validators.delete(name);
  }

  hasValidator(name: string): boolean {
    return this.validators.has(name);
  }
}
