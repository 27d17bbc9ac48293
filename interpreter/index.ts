import type { Specification } from '@core/types/spec';
import { HttpStepClient, type FetchFunction } from './http/HttpStepClient';
import { buildCommandTree } from './tree/CommandTreeBuilder';
import { runCommandTree, type CommandIO } from './tree/commander-binding';

export interface InterpretOptions extends Partial<CommandIO> {
  env?: Record<string, string | undefined>;
  timeoutMs?: number;
  fetch?: FetchFunction;
}

/**
 * Main entry point for the interpreter: build a live command tree from the
 * specification and dispatch `argv` (user arguments only) against it.
 * Resolves to the exit code.
 */
export async function interpret(
  spec: Specification,
  argv: readonly string[],
  options: InterpretOptions = {}
): Promise<number> {
  const client = new HttpStepClient({ timeoutMs: options.timeoutMs, fetch: options.fetch });
  const tree = buildCommandTree(spec, { env: options.env, client });
  return runCommandTree(tree, argv, {
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    signal: options.signal
  });
}

export { Environment } from './env/Environment';
export { ValueBackend } from './eval/value-backend';
export { executeAction, toHttpRequest } from './eval/action';
export type { ActionContext, OutputSink } from './eval/action';
export { HttpStepClient, HttpStatusError, HttpAbortError, parseBody } from './http/HttpStepClient';
export type { HttpStepRequest, HttpStepClientOptions, FetchFunction } from './http/HttpStepClient';
export { render, renderJSON, renderTable, renderText } from './output/renderers';
export { buildCommandTree } from './tree/CommandTreeBuilder';
export type { CommandNode, FlagCell, RunContext, BuildCommandTreeOptions } from './tree/CommandTreeBuilder';
export { bindCommandTree, runCommandTree } from './tree/commander-binding';
export type { CommandIO } from './tree/commander-binding';
