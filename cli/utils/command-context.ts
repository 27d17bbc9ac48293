/**
 * Command Context Utilities
 *
 * Everything a CLI command needs from its surroundings, passed in rather than
 * read from `process` so commands can run in-process under test.
 */

import * as path from 'path';
import type { Specification } from '@core/types/spec';
import type { ResolvedConfig } from '@core/config/types';
import { ConfigLoader } from '@core/config/loader';
import { parseDuration } from '@core/config/utils';
import type { OutputSink } from '@interpreter/eval/action';
import type { FetchFunction } from '@interpreter/http/HttpStepClient';
import { SpecParser } from '@services/ParserService/ParserService';
import { ValidationService } from '@services/ValidationService/ValidationService';
import { cliLogger } from '@core/utils/logger';

export interface CommandContext {
  stdout: OutputSink;
  stderr: OutputSink;
  env: Record<string, string | undefined>;
  /** Specification paths and the project config resolve from here */
  cwd: string;
  fetch?: FetchFunction;
  signal?: AbortSignal;
  /** Set by a command whose outcome is not plain success */
  exitCode: number;
}

/**
 * Parse and validate a specification file. Validation warnings go to the log.
 *
 * @throws {SpecValidationError} when the document is unreadable or invalid
 */
export async function loadSpecification(file: string, context: CommandContext): Promise<Specification> {
  const specPath = path.resolve(context.cwd, file);
  const spec = await new SpecParser().parseFile(specPath);
  new ValidationService().assertValid(spec, specPath);
  cliLogger.debug('Loaded specification', { path: specPath, name: spec.name });
  return spec;
}

/**
 * Project and global configuration, with a command-line timeout taking
 * precedence when given.
 */
export function resolveConfig(context: CommandContext, overrides: { timeout?: string } = {}): ResolvedConfig {
  const config = new ConfigLoader(context.cwd).resolve();
  if (overrides.timeout !== undefined) {
    config.http.timeoutMs = parseDuration(overrides.timeout);
  }
  return config;
}
