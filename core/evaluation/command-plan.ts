import type {
  ArgSpec,
  CommandSpec,
  Expression,
  FlagSpec,
  OutputFormat,
  Specification
} from '@core/types/spec';
import { OUTPUT_FORMATS } from '@core/types/spec';
import { RenderError } from '@core/errors';

/**
 * Structural decisions both backends honour: usage strings, arity rules, flag
 * visibility, step order and output defaults. Backends never re-derive these
 * from the raw specification.
 */

export type ArityRule =
  | { kind: 'exact'; count: number }
  | { kind: 'minimum'; count: number };

export interface StepPlan {
  name: string;
  /** Upper-cased, GET when not declared */
  method: string;
  url: Expression;
  headers?: Expression;
  body?: Expression;
}

export interface OutputPlan {
  format: OutputFormat;
  /** Absent means the last declared step's result */
  data?: Expression;
  columns?: string[];
}

export interface ActionPlan {
  steps: StepPlan[];
  output?: OutputPlan;
}

export interface CommandPlan {
  name: string;
  description?: string;
  /** Names from the root down, root included */
  path: string[];
  usage: string;
  args: ArgSpec[];
  /** Flags registered on this node: globals at the root, local flags elsewhere */
  flags: FlagSpec[];
  /** Leaves only; group commands accept anything and dispatch */
  arity?: ArityRule;
  action?: ActionPlan;
  children: CommandPlan[];
}

export interface ProgramPlan {
  root: CommandPlan;
  globalFlags: FlagSpec[];
}

export function planProgram(spec: Specification): ProgramPlan {
  const root: CommandPlan = {
    name: spec.name,
    description: spec.description,
    path: [spec.name],
    usage: spec.name,
    args: [],
    flags: spec.flags,
    children: spec.commands.map(command => planCommand(command, [spec.name]))
  };
  return { root, globalFlags: spec.flags };
}

function planCommand(command: CommandSpec, parentPath: string[]): CommandPlan {
  const path = [...parentPath, command.name];
  const leaf = command.action !== undefined;
  return {
    name: command.name,
    description: command.description,
    path,
    usage: leaf ? usageString(command.name, command.args) : command.name,
    args: command.args,
    flags: command.flags,
    arity: leaf ? arityRule(command.args) : undefined,
    action: command.action && {
      steps: command.action.steps.map(step => ({
        name: step.name,
        method: (step.method ?? 'GET').toUpperCase(),
        url: step.url,
        headers: step.headers,
        body: step.body
      })),
      output: command.action.output && {
        format: outputFormat(command.action.output.format, path),
        data: command.action.output.data,
        columns: command.action.output.columns
      }
    },
    children: command.commands.map(child => planCommand(child, path))
  };
}

function outputFormat(format: string | undefined, path: string[]): OutputFormat {
  const requested = format ?? 'json';
  const known = OUTPUT_FORMATS.find(candidate => candidate === requested);
  if (!known) {
    throw new RenderError(
      `unsupported output format "${requested}" for command "${path.join(' ')}" (expected ${OUTPUT_FORMATS.join(', ')})`,
      requested
    );
  }
  return known;
}

/**
 * Command name followed by `<required>` and `[optional]` args in declaration order.
 */
export function usageString(name: string, args: readonly ArgSpec[]): string {
  return args.length > 0 ? `${name} ${argumentUsage(args)}` : name;
}

export function argumentUsage(args: readonly ArgSpec[]): string {
  return args.map(arg => (arg.required ? `<${arg.name}>` : `[${arg.name}]`)).join(' ');
}

/**
 * Commander option flags for a flag: every flag takes one string value.
 */
export function optionFlags(flag: FlagSpec): string {
  return flag.short ? `-${flag.short}, --${flag.name} <value>` : `--${flag.name} <value>`;
}

export function arityRule(args: readonly ArgSpec[]): ArityRule {
  const required = args.filter(arg => arg.required).length;
  return required === args.length
    ? { kind: 'exact', count: required }
    : { kind: 'minimum', count: required };
}

export function satisfiesArity(rule: ArityRule, received: number): boolean {
  return rule.kind === 'exact' ? received === rule.count : received >= rule.count;
}

/**
 * Message for an arity violation. `received` is a number in the interpreter and
 * a source fragment in generated programs, so both print the same text.
 */
export function arityMessage(rule: ArityRule, received: string | number): string {
  const noun = rule.count === 1 ? 'arg' : 'args';
  return rule.kind === 'exact'
    ? `accepts ${rule.count} ${noun}, received ${received}`
    : `requires at least ${rule.count} ${noun}, only received ${received}`;
}

export function requiredFlagMessage(names: readonly string[]): string {
  return requiredFlagListMessage(names.map(quoteFlagName).join(', '));
}

/**
 * Same wording with the name list already rendered; generated programs pass a
 * source fragment that joins the names at run time.
 */
export function requiredFlagListMessage(list: string): string {
  return `required flag(s) ${list} not set`;
}

export function quoteFlagName(name: string): string {
  return `"${name}"`;
}

/**
 * Flags a leaf's action can reference: the globals plus its own local flags.
 * Local flags of intermediate groups are not visible.
 */
export function visibleFlags(program: ProgramPlan, command: CommandPlan): FlagSpec[] {
  return command === program.root ? program.globalFlags : [...program.globalFlags, ...command.flags];
}

/**
 * Depth-first walk, parents before children.
 */
export function* walkCommands(command: CommandPlan): Generator<CommandPlan> {
  yield command;
  for (const child of command.children) {
    yield* walkCommands(child);
  }
}
