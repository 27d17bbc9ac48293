import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { compile } from '@compiler/index';
import { loadSpecification, resolveConfig, type CommandContext } from '../utils/command-context';

export interface BuildCommandOptions {
  output: string;
  source?: string;
  target?: string;
  minify?: boolean;
  timeout?: string;
}

/**
 * Generate a program and bundle it into a single executable.
 */
export async function buildCommand(specPath: string, options: BuildCommandOptions, context: CommandContext): Promise<void> {
  const spec = await loadSpecification(specPath, context);
  const config = resolveConfig(context, options);

  const result = await compile(spec, {
    outputPath: path.resolve(context.cwd, options.output),
    sourcePath: options.source ? path.resolve(context.cwd, options.source) : undefined,
    resolveDir: context.cwd,
    timeoutMs: config.http.timeoutMs,
    format: config.format.enabled,
    printWidth: config.format.printWidth,
    target: options.target ?? config.build.target,
    minify: options.minify ?? config.build.minify
  });

  if (result.generated.formatError) {
    context.stderr.write(`${chalk.yellow('Warning:')} ${result.generated.formatError.message}\n`);
  }
  context.stdout.write(`${chalk.green('✓')} Built ${options.output} (${result.bytes} bytes)\n`);
}

export function createBuildCommand(context: CommandContext): Command {
  return new Command('build')
    .description('Compile a specification into a standalone executable')
    .argument('<spec>', 'specification file (YAML or JSON)')
    .requiredOption('-o, --output <file>', 'executable to write')
    .option('--source <file>', 'also write the generated TypeScript here')
    .option('--target <target>', 'esbuild target, e.g. node20')
    .option('--minify', 'minify the bundle')
    .option('--timeout <duration>', 'per-request timeout baked into the program')
    .action(async (specPath: string, options: BuildCommandOptions) => {
      await buildCommand(specPath, options, context);
    });
}
