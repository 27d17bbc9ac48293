/**
 * Run CLI Command
 * Interpret a specification and dispatch the remaining arguments against it
 */

import { Command } from 'commander';
import { interpret } from '@interpreter/index';
import { cliLogger } from '@core/utils/logger';
import { loadSpecification, resolveConfig, type CommandContext } from '../utils/command-context';

export interface RunOptions {
  timeout?: string;
}

export async function runCommand(specPath: string, args: string[], options: RunOptions, context: CommandContext): Promise<number> {
  const spec = await loadSpecification(specPath, context);
  const config = resolveConfig(context, options);
  cliLogger.debug('Interpreting specification', { name: spec.name, args });

  return interpret(spec, args, {
    stdout: context.stdout,
    stderr: context.stderr,
    env: context.env,
    timeoutMs: config.http.timeoutMs,
    fetch: context.fetch,
    signal: context.signal
  });
}

export function createRunCommand(context: CommandContext): Command {
  return new Command('run')
    .description('Run the CLI a specification describes, without generating code')
    .argument('<spec>', 'specification file (YAML or JSON)')
    .argument('[args...]', 'arguments and flags for the described CLI')
    .option('--timeout <duration>', 'per-request timeout, e.g. 500ms or 10s')
    .passThroughOptions()
    .action(async (specPath: string, args: string[], options: RunOptions) => {
      context.exitCode = await runCommand(specPath, args, options, context);
    });
}
