import type { ArgSpec, FlagSpec, Specification } from '@core/types/spec';
import {
  arityMessage,
  planProgram,
  requiredFlagMessage,
  satisfiesArity,
  visibleFlags,
  type ArityRule,
  type CommandPlan,
  type ProgramPlan
} from '@core/evaluation';
import { ArgumentCountError, RequiredFlagError } from '@core/errors';
import { interpreterLogger as logger } from '@core/utils/logger';
import { Environment } from '@interpreter/env/Environment';
import { executeAction, type OutputSink } from '@interpreter/eval/action';
import { HttpStepClient } from '@interpreter/http/HttpStepClient';

/**
 * Live storage for one flag. `value` starts at the effective default and is
 * overwritten once per invocation by the command-line binding.
 */
export interface FlagCell {
  readonly spec: FlagSpec;
  /** Environment value when named and non-empty, else the declared default */
  readonly defaultValue: string;
  value: string;
}

export interface RunContext {
  stdout: OutputSink;
  signal?: AbortSignal;
}

export interface CommandNode {
  readonly name: string;
  readonly description?: string;
  readonly usage: string;
  /** Names from the root down */
  readonly path: readonly string[];
  readonly args: readonly ArgSpec[];
  /** Flags registered at this node: globals at the root, local flags elsewhere */
  readonly flags: readonly FlagCell[];
  readonly children: readonly CommandNode[];
  /** Leaves only */
  readonly arity?: ArityRule;
  /** @throws {ArgumentCountError} */
  validateArgs(args: readonly string[]): void;
  /** Leaves only */
  readonly run?: (args: readonly string[], context: RunContext) => Promise<void>;
}

export interface BuildCommandTreeOptions {
  /** Source of environment fallbacks, read once while building */
  env?: Record<string, string | undefined>;
  client?: HttpStepClient;
}

/**
 * Build a live command tree. Group nodes only dispatch; leaves carry a run
 * handler that checks the invocation and executes the action.
 *
 * @throws {RenderError} when a leaf declares an unknown output format
 */
export function buildCommandTree(spec: Specification, options: BuildCommandTreeOptions = {}): CommandNode {
  const program = planProgram(spec);
  const env = options.env ?? process.env;
  const client = options.client ?? new HttpStepClient();

  const cells = new Map<string, FlagCell>();
  const cellFor = (flag: FlagSpec): FlagCell => {
    const fromEnv = flag.env ? env[flag.env] : undefined;
    const cell: FlagCell = {
      spec: flag,
      defaultValue: fromEnv ? fromEnv : flag.default ?? '',
      value: ''
    };
    cell.value = cell.defaultValue;
    cells.set(flag.name, cell);
    return cell;
  };

  const build = (plan: CommandPlan): CommandNode => {
    const flags = plan.flags.map(cellFor);
    const children = plan.children.map(build);
    return {
      name: plan.name,
      description: plan.description,
      usage: plan.usage,
      path: plan.path,
      args: plan.args,
      flags,
      children,
      arity: plan.arity,
      validateArgs: args => checkArity(plan, args),
      run: plan.action && leafHandler(program, plan, cells, client)
    };
  };

  const tree = build(program.root);
  logger.debug('Built command tree', { name: spec.name, flags: cells.size });
  return tree;
}

function checkArity(plan: CommandPlan, args: readonly string[]): void {
  if (plan.arity && !satisfiesArity(plan.arity, args.length)) {
    throw new ArgumentCountError(arityMessage(plan.arity, args.length), plan.path.join(' '));
  }
}

function leafHandler(
  program: ProgramPlan,
  plan: CommandPlan,
  cells: ReadonlyMap<string, FlagCell>,
  client: HttpStepClient
): (args: readonly string[], context: RunContext) => Promise<void> {
  const visible = visibleFlags(program, plan);
  return async (args, context) => {
    const action = plan.action;
    if (!action) {
      return;
    }
    checkArity(plan, args);

    const values = new Map<string, string>();
    for (const flag of visible) {
      values.set(flag.name, cells.get(flag.name)?.value ?? '');
    }
    const missing = visible.filter(flag => flag.required && values.get(flag.name) === '').map(flag => flag.name);
    if (missing.length > 0) {
      throw new RequiredFlagError(requiredFlagMessage(missing), plan.path.join(' '), missing);
    }

    logger.debug('Running command', { command: plan.path.join(' '), args: args.length });
    const env = new Environment(values, args, plan.args.map(arg => arg.name));
    await executeAction(action, env, { client, stdout: context.stdout, signal: context.signal });
  };
}
