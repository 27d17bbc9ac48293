import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { SpecParser } from '@services/ParserService/ParserService';
import { ValidationService } from '@services/ValidationService/ValidationService';
import type { CommandContext } from '../utils/command-context';

/**
 * Report every problem in a specification without running it. Warnings do
 * not fail the check.
 */
export async function validateCommand(specPath: string, context: CommandContext): Promise<number> {
  const spec = await new SpecParser().parseFile(path.resolve(context.cwd, specPath));
  const result = new ValidationService().validate(spec);

  for (const warning of result.warnings) {
    context.stderr.write(`${chalk.yellow('warning:')} ${warning}\n`);
  }
  for (const error of result.errors) {
    context.stderr.write(`${chalk.red('error:')} ${error}\n`);
  }
  if (result.errors.length > 0) {
    context.stderr.write(`${specPath}: ${result.errors.length} error(s)\n`);
    return 1;
  }

  context.stdout.write(`${chalk.green('✓')} ${specPath} is valid\n`);
  return 0;
}

export function createValidateCommand(context: CommandContext): Command {
  return new Command('validate')
    .description('Check a specification for errors')
    .argument('<spec>', 'specification file (YAML or JSON)')
    .action(async (specPath: string) => {
      context.exitCode = await validateCommand(specPath, context);
    });
}
