/**
 * Central export point for clidef error types.
 */
export { ClidefError, ErrorSeverity, errorMessage } from './ClidefError';
export type { BaseErrorDetails, ClidefErrorOptions } from './ClidefError';
export { ExpressionReferenceError, ReferenceErrorCode } from './ExpressionReferenceError';
export { StepExecutionError, stepFailureMessage } from './StepExecutionError';
export { RenderError } from './RenderError';
export { BuildError } from './BuildError';
export { FormatError } from './FormatError';
export { SpecValidationError } from './SpecValidationError';
export { ArgumentCountError, RequiredFlagError } from './InvocationError';
