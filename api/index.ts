/**
 * clidef API Entry Point
 *
 * Load a specification, then run it live or turn it into a standalone program.
 */
import type { Specification } from '@core/types/spec';
import { SpecParser } from '@services/ParserService/ParserService';
import { ValidationService } from '@services/ValidationService/ValidationService';
import { interpret, type InterpretOptions } from '@interpreter/index';
import { compile, generateSource, type CompileOptions, type CompileResult, type GenerateOptions, type GeneratedSource } from '@compiler/index';

// Export core types/errors
export * from '@core/errors';
export type * from '@core/types/spec';
export { version } from '@core/version';
export { SpecParser, ValidationService };
export { interpret, compile, generateSource };
export type { InterpretOptions, CompileOptions, CompileResult, GenerateOptions, GeneratedSource };

/**
 * Parse and validate a YAML or JSON specification document.
 *
 * @throws {SpecValidationError} listing every problem found
 */
export function loadSpec(content: string, source?: string): Specification {
  const spec = new SpecParser().parse(content, source);
  new ValidationService().assertValid(spec, source);
  return spec;
}

/**
 * Run the CLI a specification document describes. Resolves to the exit code.
 */
export async function runSpec(content: string, argv: readonly string[], options: InterpretOptions = {}): Promise<number> {
  return interpret(loadSpec(content), argv, options);
}

/**
 * TypeScript source of a standalone program for a specification document.
 */
export async function generateProgram(content: string, options: GenerateOptions = {}): Promise<GeneratedSource> {
  return generateSource(loadSpec(content), options);
}
