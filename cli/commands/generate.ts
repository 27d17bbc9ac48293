import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { generateSource } from '@compiler/generator';
import { loadSpecification, resolveConfig, type CommandContext } from '../utils/command-context';

export interface GenerateOptions {
  output?: string;
  format: boolean;
  timeout?: string;
}

/**
 * Print or write the TypeScript program for a specification.
 */
export async function generateCommand(specPath: string, options: GenerateOptions, context: CommandContext): Promise<void> {
  const spec = await loadSpecification(specPath, context);
  const config = resolveConfig(context, options);
  const generated = await generateSource(spec, {
    timeoutMs: config.http.timeoutMs,
    format: options.format && config.format.enabled,
    printWidth: config.format.printWidth
  });

  if (generated.formatError) {
    context.stderr.write(`${chalk.yellow('Warning:')} ${generated.formatError.message}\n`);
  }

  if (!options.output) {
    context.stdout.write(generated.source);
    return;
  }
  const outputPath = path.resolve(context.cwd, options.output);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, generated.source, 'utf8');
  context.stdout.write(`${chalk.green('✓')} Generated ${options.output}\n`);
}

export function createGenerateCommand(context: CommandContext): Command {
  return new Command('generate')
    .description('Generate the TypeScript source of a standalone CLI')
    .argument('<spec>', 'specification file (YAML or JSON)')
    .option('-o, --output <file>', 'write the source here instead of stdout')
    .option('--no-format', 'skip formatting the generated source')
    .option('--timeout <duration>', 'per-request timeout baked into the program')
    .action(async (specPath: string, options: GenerateOptions) => {
      await generateCommand(specPath, options, context);
    });
}
