import { resolveExpression, type ResolverBackend } from './ExpressionResolver';
import type { ScopeTable } from './scope';
import type { ActionPlan, OutputPlan, StepPlan } from './command-plan';

export interface StepRequest<T> {
  url: T;
  headers?: T;
  body?: T;
}

/**
 * How a backend realizes an action: the compiler emits statements, the
 * interpreter performs requests and writes output.
 */
export interface ActionRealization<T, F, S> {
  backend: ResolverBackend<T, F, S>;
  /** Returns what later expressions bind the step's name to */
  performStep(step: StepPlan, request: StepRequest<T>): S | Promise<S>;
  emitOutput(output: OutputPlan, data: T): void | Promise<void>;
}

export type ActionScope<F, S> = Pick<ScopeTable<F, S>, 'flags' | 'args'> & {
  /** Receives each step binding as the step finishes; a fresh map when omitted */
  steps?: Map<string, S>;
};

/**
 * Walk an action in declaration order. Step N resolves against flags, args and
 * steps 0..N-1 only; the output resolves against every step. Without a data
 * expression the output shows the last step's result, or null when there are
 * no steps.
 */
export async function walkAction<T, F, S>(
  action: ActionPlan,
  scope: ActionScope<F, S>,
  realization: ActionRealization<T, F, S>
): Promise<void> {
  const { backend } = realization;
  const steps = scope.steps ?? new Map<string, S>();
  const current: ScopeTable<F, S> = { flags: scope.flags, args: scope.args, steps };
  let last: { name: string; binding: S } | undefined;

  for (const step of action.steps) {
    const site = `step "${step.name}"`;
    const request: StepRequest<T> = {
      url: resolveExpression(step.url, current, backend, `${site} url`),
      headers: step.headers && resolveExpression(step.headers, current, backend, `${site} headers`),
      body: step.body && resolveExpression(step.body, current, backend, `${site} body`)
    };
    const binding = await realization.performStep(step, request);
    steps.set(step.name, binding);
    last = { name: step.name, binding };
  }

  const output = action.output;
  if (!output) {
    return;
  }

  let data: T;
  if (output.data) {
    data = resolveExpression(output.data, current, backend, 'output data');
  } else if (last) {
    data = backend.step(last.binding, [], last.name);
  } else {
    data = backend.literal(null);
  }
  await realization.emitOutput(output, data);
}
