import type { Value } from '@core/types/value';
import type { ScopeTable } from '@core/evaluation/scope';
import { argPositions } from '@core/evaluation/scope';
import { ValueBackend } from '@interpreter/eval/value-backend';

/**
 * State of one action execution. Flags and positional args are present from
 * the start; each step result becomes visible once that step has finished.
 * Never shared between executions.
 */
export class Environment {
  private readonly stepResults = new Map<string, Value>();
  readonly backend: ValueBackend;

  constructor(
    readonly flags: ReadonlyMap<string, string>,
    /** Positional arguments as supplied on the command line */
    readonly args: readonly string[],
    private readonly argNames: readonly string[]
  ) {
    this.backend = new ValueBackend(args);
  }

  /** Step results are recorded into this environment as the action runs */
  scope(): ScopeTable<string, Value> & { steps: Map<string, Value> } {
    return {
      flags: this.flags,
      args: argPositions(this.argNames),
      steps: this.stepResults
    };
  }

  addStepResult(name: string, result: Value): void {
    this.stepResults.set(name, result);
  }

  getStepResult(name: string): Value | undefined {
    return this.stepResults.get(name);
  }

  get stepNames(): string[] {
    return Array.from(this.stepResults.keys());
  }
}
