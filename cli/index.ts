import { Command, CommanderError } from 'commander';
import { version } from '@core/version';
import { setLogLevel } from '@core/utils/logger';
import { ErrorHandler } from './error/ErrorHandler';
import { createRunCommand } from './commands/run';
import { createGenerateCommand } from './commands/generate';
import { createBuildCommand } from './commands/build';
import { createValidateCommand } from './commands/validate';
import type { CommandContext } from './utils/command-context';

export type { CommandContext } from './utils/command-context';

export type CLIOptions = {
  verbose?: boolean;
  debug?: boolean;
};

/**
 * The host program: `run`, `generate`, `build` and `validate` over a
 * specification file.
 */
export function createProgram(context: CommandContext): Command {
  const program = new Command('clidef')
    .description('Turn a declarative CLI specification into a working command-line program')
    .version(version)
    .option('--verbose', 'log progress')
    .option('--debug', 'log everything, with error causes')
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: text => context.stdout.write(text),
      writeErr: text => context.stderr.write(text)
    })
    .hook('preAction', command => {
      const options = command.opts<CLIOptions>();
      if (options.debug) {
        setLogLevel('debug');
      } else if (options.verbose) {
        setLogLevel('info');
      }
    });

  for (const command of [
    createRunCommand(context),
    createGenerateCommand(context),
    createBuildCommand(context),
    createValidateCommand(context)
  ]) {
    // Subcommands share the host's output and exit handling
    program.addCommand(
      command.exitOverride().configureOutput({
        writeOut: text => context.stdout.write(text),
        writeErr: text => context.stderr.write(text)
      })
    );
  }
  return program;
}

/**
 * Main CLI entry point. `argv` holds user arguments only; resolves to the
 * process exit code.
 */
export async function main(argv: string[], overrides: Partial<CommandContext> = {}): Promise<number> {
  const context: CommandContext = {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
    ...overrides,
    exitCode: 0
  };
  const program = createProgram(context);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return context.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const { debug } = program.opts<CLIOptions>();
    return new ErrorHandler(context.stderr, { debug }).handleError(error);
  }
}
