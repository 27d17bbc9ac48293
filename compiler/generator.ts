import type { FlagSpec, Specification } from '@core/types/spec';
import {
  argPositions,
  argumentUsage,
  arityMessage,
  optionFlags,
  planProgram,
  quoteFlagName,
  requiredFlagListMessage,
  visibleFlags,
  walkAction,
  walkCommands,
  type CommandPlan,
  type OutputPlan,
  type ProgramPlan
} from '@core/evaluation';
import { DEFAULT_HTTP_TIMEOUT_MS } from '@core/config/loader';
import type { FormatError } from '@core/errors';
import { compilerLogger as logger } from '@core/utils/logger';
import { IdentifierAllocator } from './identifiers';
import { scanFeatures, type Feature } from './feature-usage';
import { supportRoutines } from './support-routines';
import { SourceBackend, quote } from './SourceBackend';
import { SourceWriter } from './SourceWriter';
import { formatSource } from './formatter';

export interface GenerateOptions {
  /** Per-request timeout baked into the program */
  timeoutMs?: number;
  /** Run prettier over the result (default true) */
  format?: boolean;
  printWidth?: number;
}

export interface GeneratedSource {
  source: string;
  /** Support routines the program carries */
  features: Feature[];
  /** Set when formatting failed; `source` is then the raw output */
  formatError?: FormatError;
}

interface FlagIdentifiers {
  /** Holds the flag's string value inside a run handler */
  value: string;
  /** Holds the commander Option */
  option: string;
}

interface ProgramIdentifiers {
  flags: Map<string, FlagIdentifiers>;
  commands: Map<CommandPlan, string>;
  steps: Map<CommandPlan, Map<string, string>>;
}

/**
 * Translate a specification into the TypeScript source of a commander program.
 *
 * Pass 1 assigns identifiers and collects the support routines the program
 * needs; pass 2 emits the program. A reference error in any expression aborts
 * generation and no source is returned.
 */
export async function generateSource(spec: Specification, options: GenerateOptions = {}): Promise<GeneratedSource> {
  const program = planProgram(spec);

  // Pass 1
  const features = scanFeatures(program);
  const identifiers = allocateIdentifiers(program);
  logger.debug('Planned generated program', { name: spec.name, features: [...features] });

  // Pass 2
  const emitter = new ProgramEmitter(program, identifiers, features, options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS);
  const raw = await emitter.emit();

  const result: GeneratedSource = { source: raw, features: [...features] };
  if (options.format === false) {
    return result;
  }
  const formatted = await formatSource(raw, { printWidth: options.printWidth });
  return { ...result, source: formatted.source, formatError: formatted.error };
}

function allocateIdentifiers(program: ProgramPlan): ProgramIdentifiers {
  const allocator = new IdentifierAllocator(['program']);
  const result: ProgramIdentifiers = { flags: new Map(), commands: new Map(), steps: new Map() };

  for (const command of walkCommands(program.root)) {
    result.commands.set(
      command,
      command === program.root ? 'program' : allocator.allocate('cmd', command.path.slice(1).join(' '))
    );
    for (const flag of command.flags) {
      result.flags.set(flag.name, {
        value: allocator.allocate('flag', flag.name),
        option: allocator.allocate('option', flag.name)
      });
    }
    if (command.action) {
      result.steps.set(
        command,
        new Map(command.action.steps.map(step => [step.name, allocator.allocate('step', step.name, 'Result')] as const))
      );
    }
  }
  return result;
}

class ProgramEmitter {
  private readonly writer = new SourceWriter();
  private readonly backend: SourceBackend;

  constructor(
    private readonly program: ProgramPlan,
    private readonly identifiers: ProgramIdentifiers,
    private readonly features: ReadonlySet<Feature>,
    private readonly timeoutMs: number
  ) {
    this.backend = new SourceBackend(features);
  }

  async emit(): Promise<string> {
    const w = this.writer;
    w.line(`// Code generated by clidef from the ${quote(this.program.root.name)} specification. DO NOT EDIT.`);
    w.line('import { Command, CommanderError, Option } from "commander";');
    w.line();
    w.raw(supportRoutines(this.features, { timeoutMs: this.timeoutMs }));
    w.line();

    w.line('export async function main(argv: string[], signal?: AbortSignal): Promise<number> {').indent();
    w.line(`const program = new Command(${quote(this.program.root.name)})`).indent();
    w.line('.exitOverride()');
    w.line('.configureOutput({').indent();
    w.line('writeOut: (text) => process.stdout.write(text),');
    w.line('writeErr: (text) => process.stderr.write(text),');
    w.dedent().line('});').dedent();
    await this.emitCommand(this.program.root);

    w.line();
    w.line('try {').indent();
    w.line('await program.parseAsync(argv, { from: "user" });');
    w.line('return 0;');
    w.dedent().line('} catch (error) {').indent();
    w.line('if (error instanceof CommanderError) return error.exitCode;');
    w.line('process.stderr.write(`Error: ${errorMessage(error)}\\n`);');
    w.line('return 1;');
    w.dedent().line('}');
    w.dedent().line('}');

    w.line();
    w.block('if (require.main === module) {', () => {
      w.line('const controller = new AbortController();');
      w.line('process.on("SIGINT", () => controller.abort());');
      w.line('main(process.argv.slice(2), controller.signal).then(');
      w.line('  (code) => {');
      w.line('    process.exitCode = code;');
      w.line('  },');
      w.line('  (error) => {');
      w.line('    process.stderr.write(`Error: ${errorMessage(error)}\\n`);');
      w.line('    process.exitCode = 1;');
      w.line('  },');
      w.line(');');
    });

    return w.toString();
  }

  private async emitCommand(command: CommandPlan, parent?: string): Promise<void> {
    const w = this.writer;
    const id = this.commandId(command);
    if (parent !== undefined) {
      w.line();
      w.line(`const ${id} = ${parent}.command(${quote(command.name)});`);
    }
    if (command.description) {
      w.line(`${id}.description(${quote(command.description)});`);
    }
    const args = argumentUsage(command.args);
    if (args) {
      w.line(`${id}.usage(${quote(`[options] ${args}`)});`);
    }
    w.line(`${id}.allowExcessArguments(true);`);

    for (const flag of command.flags) {
      const { option } = this.flagIds(flag);
      w.line(`const ${option} = new Option(${quote(optionFlags(flag))}, ${quote(flag.description ?? '')}).default(${this.defaultValue(flag)});`);
      w.line(`${id}.addOption(${option});`);
    }

    if (command.action) {
      await this.emitRunBody(command, id);
    }
    for (const child of command.children) {
      await this.emitCommand(child, id);
    }
  }

  private defaultValue(flag: FlagSpec): string {
    const declared = quote(flag.default ?? '');
    return flag.env ? `envOr(${quote(flag.env)}, ${declared})` : declared;
  }

  private async emitRunBody(command: CommandPlan, id: string): Promise<void> {
    const w = this.writer;
    const action = command.action;
    if (!action) {
      return;
    }

    w.line(`${id}.action(async () => {`).indent();
    w.line(`const args = ${id}.args;`);
    const arity = command.arity;
    if (arity && (arity.kind === 'exact' || arity.count > 0)) {
      const test = arity.kind === 'exact' ? `args.length !== ${arity.count}` : `args.length < ${arity.count}`;
      w.line(`if (${test}) throw new Error(\`${arityMessage(arity, '${args.length}')}\`);`);
    }

    const flags = visibleFlags(this.program, command);
    if (flags.length > 0) {
      w.line(`const options = ${id}.optsWithGlobals();`);
    }
    for (const flag of flags) {
      const { value, option } = this.flagIds(flag);
      w.line(`const ${value} = String(options[${option}.attributeName()] ?? "");`);
    }
    const required = flags.filter(flag => flag.required);
    if (required.length > 0) {
      w.line('const missing: string[] = [];');
      for (const flag of required) {
        w.line(`if (${this.flagIds(flag).value} === "") missing.push(${quote(quoteFlagName(flag.name))});`);
      }
      w.line(`if (missing.length > 0) throw new Error(\`${requiredFlagListMessage('${missing.join(", ")}')}\`);`);
    }

    const steps = this.identifiers.steps.get(command) ?? new Map<string, string>();
    await walkAction(
      action,
      {
        flags: new Map(flags.map(flag => [flag.name, this.flagIds(flag).value] as const)),
        args: argPositions(command.args.map(arg => arg.name))
      },
      {
        backend: this.backend,
        performStep: (step, request) => {
          const result = steps.get(step.name);
          if (!result) {
            throw new Error(`no identifier allocated for step "${step.name}"`);
          }
          const call = `httpStep(${quote(step.method)}, ${request.url}, ${request.headers ?? 'undefined'}, ${request.body ?? 'undefined'}, signal)`;
          w.line(`const ${result} = await runStep(${quote(step.name)}, () => ${call});`);
          return result;
        },
        emitOutput: (output, data) => {
          w.line(`process.stdout.write(${renderCall(output, data)});`);
        }
      }
    );
    w.dedent().line('});');
  }

  private commandId(command: CommandPlan): string {
    const id = this.identifiers.commands.get(command);
    if (!id) {
      throw new Error(`no identifier allocated for command "${command.path.join(' ')}"`);
    }
    return id;
  }

  private flagIds(flag: FlagSpec): FlagIdentifiers {
    const ids = this.identifiers.flags.get(flag.name);
    if (!ids) {
      throw new Error(`no identifier allocated for flag "${flag.name}"`);
    }
    return ids;
  }
}

function renderCall(output: OutputPlan, data: string): string {
  switch (output.format) {
    case 'json':
      return `renderJson(${data})`;
    case 'table':
      return `renderTable(${data}, [${(output.columns ?? []).map(quote).join(', ')}])`;
    case 'text':
      return `renderText(${data})`;
  }
}
