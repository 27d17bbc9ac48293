/**
 * Names resolvable at one point of an action. Flags and args are fixed for the
 * whole action; steps grow as each step finishes.
 *
 * `F` and `S` are whatever the backend binds a flag or a step result to: an
 * identifier in generated source, a live value in the interpreter.
 */
export interface ScopeTable<F, S> {
  flags: ReadonlyMap<string, F>;
  /** Arg name to its declared position */
  args: ReadonlyMap<string, number>;
  steps: ReadonlyMap<string, S>;
}

export function argPositions(names: readonly string[]): Map<string, number> {
  return new Map(names.map((name, position) => [name, position] as const));
}
