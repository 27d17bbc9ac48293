import { Command, CommanderError, Option } from 'commander';
import { argumentUsage, optionFlags } from '@core/evaluation';
import { errorMessage } from '@core/errors';
import { interpreterLogger as logger } from '@core/utils/logger';
import type { OutputSink } from '@interpreter/eval/action';
import type { CommandNode, FlagCell } from './CommandTreeBuilder';

export interface CommandIO {
  stdout: OutputSink;
  stderr: OutputSink;
  signal?: AbortSignal;
}

/**
 * Register a command tree with commander. Arity and required flags are left
 * to the tree so messages match generated programs; commander only parses.
 */
export function bindCommandTree(tree: CommandNode, io: CommandIO): Command {
  const program = new Command(tree.name)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text)
    });
  configure(program, tree, io, []);
  return program;
}

interface Binding {
  cell: FlagCell;
  attribute: string;
}

function configure(command: Command, node: CommandNode, io: CommandIO, inherited: readonly Binding[]): void {
  if (node.description) {
    command.description(node.description);
  }
  const args = argumentUsage(node.args);
  if (args) {
    command.usage(`[options] ${args}`);
  }
  command.allowExcessArguments(true);

  // Every flag registered on this command or an ancestor
  const bindings: Binding[] = [
    ...inherited,
    ...node.flags.map(cell => {
      const option = new Option(optionFlags(cell.spec), cell.spec.description ?? '').default(cell.defaultValue);
      command.addOption(option);
      return { cell, attribute: option.attributeName() };
    })
  ];

  const run = node.run;
  if (run) {
    command.action(async () => {
      const values = command.optsWithGlobals();
      for (const { cell, attribute } of bindings) {
        cell.value = String(values[attribute] ?? '');
      }
      await run(command.args, { stdout: io.stdout, signal: io.signal });
    });
  }

  for (const child of node.children) {
    configure(command.command(child.name), child, io, bindings);
  }
}

/**
 * Parse `argv` (user arguments only) and dispatch. Returns the process exit
 * code: commander's own for usage errors and help, 1 for run failures.
 */
export async function runCommandTree(tree: CommandNode, argv: readonly string[], io: CommandIO): Promise<number> {
  const program = bindCommandTree(tree, io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.debug('Command failed', { error: errorMessage(error) });
    io.stderr.write(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
