import type { CommandSpec, Expression, FlagSpec, Specification } from '@core/types/spec';
import { OUTPUT_FORMATS } from '@core/types/spec';
import { collectReferences } from '@core/evaluation/ExpressionResolver';
import type { ValidationResult } from '../IValidationService';

const HTTP_METHOD = /^[A-Za-z]+$/;

/**
 * Steps and output of every leaf, including each reference against what is in
 * scope at that point. Both backends would reject the same references later;
 * this reports all of them before anything runs.
 */
export function validateActions(spec: Specification, result: ValidationResult): void {
  const walk = (command: CommandSpec, path: string[]) => {
    const where = `command "${[...path, command.name].join(' ')}"`;
    if (command.action) {
      validateAction(command, [...spec.flags, ...command.flags], where, result);
    }
    for (const child of command.commands) {
      walk(child, [...path, command.name]);
    }
  };
  for (const command of spec.commands) {
    walk(command, []);
  }
}

function validateAction(command: CommandSpec, flags: FlagSpec[], where: string, result: ValidationResult): void {
  const action = command.action;
  if (!action) {
    return;
  }
  const scope = {
    flag: new Set(flags.map(flag => flag.name)),
    arg: new Set(command.args.map(arg => arg.name)),
    step: new Set<string>()
  };

  const checkReferences = (expression: Expression, site: string) => {
    for (const ref of collectReferences(expression)) {
      if (!scope[ref.namespace].has(ref.name)) {
        result.errors.push(`${where} ${site}: unknown ${ref.namespace} "${ref.name}"`);
      }
    }
  };

  const stepNames = new Set<string>();
  for (const step of action.steps) {
    const site = `step "${step.name}"`;
    if (stepNames.has(step.name)) {
      result.errors.push(`${where}: duplicate step "${step.name}"`);
    }
    stepNames.add(step.name);

    if (step.method !== undefined && !HTTP_METHOD.test(step.method)) {
      result.errors.push(`${where} ${site}: invalid HTTP method "${step.method}"`);
    }
    checkReferences(step.url, `${site} url`);
    if (step.headers) {
      if (step.headers.type !== 'object') {
        result.errors.push(`${where} ${site}: headers must be a mapping`);
      }
      checkReferences(step.headers, `${site} headers`);
    }
    if (step.body) {
      checkReferences(step.body, `${site} body`);
    }
    scope.step.add(step.name);
  }

  const output = action.output;
  if (!output) {
    return;
  }
  const format = output.format ?? 'json';
  if (!OUTPUT_FORMATS.some(known => known === format)) {
    result.errors.push(`${where}: unsupported output format "${format}" (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  if (output.columns && format !== 'table') {
    result.warnings.push(`${where}: columns only apply to table output`);
  }
  if (output.data) {
    checkReferences(output.data, 'output data');
  }
}
