import type { CommandSpec, Specification } from '@core/types/spec';
import type { ValidationResult } from '../IValidationService';

const COMMAND_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Command tree shape: unique sibling names, leaves or groups but not both,
 * unique arg names.
 */
export function validateCommands(spec: Specification, result: ValidationResult): void {
  if (!COMMAND_NAME.test(spec.name)) {
    result.errors.push(`invalid program name "${spec.name}"`);
  }
  checkSiblings(spec.commands, spec.name, result);
  for (const command of spec.commands) {
    visit(command, [spec.name], result);
  }
}

function visit(command: CommandSpec, parent: string[], result: ValidationResult): void {
  const path = [...parent, command.name];
  const where = `command "${path.slice(1).join(' ')}"`;

  if (!COMMAND_NAME.test(command.name)) {
    result.errors.push(`${where}: invalid command name`);
  }
  if (command.action && command.commands.length > 0) {
    result.errors.push(`${where}: a command with an action cannot have subcommands`);
  }
  if (!command.action && command.commands.length === 0) {
    result.warnings.push(`${where}: has neither an action nor subcommands`);
  }

  const argNames = new Set<string>();
  let sawOptional = false;
  for (const arg of command.args) {
    if (argNames.has(arg.name)) {
      result.errors.push(`${where}: duplicate arg "${arg.name}"`);
    }
    argNames.add(arg.name);
    if (arg.required && sawOptional) {
      result.warnings.push(`${where}: required arg "${arg.name}" follows an optional arg`);
    }
    sawOptional = sawOptional || !arg.required;
  }
  if (!command.action && command.args.length > 0) {
    result.warnings.push(`${where}: args are ignored on a command without an action`);
  }

  checkSiblings(command.commands, where, result);
  for (const child of command.commands) {
    visit(child, path, result);
  }
}

function checkSiblings(commands: CommandSpec[], where: string, result: ValidationResult): void {
  const seen = new Set<string>();
  for (const command of commands) {
    if (seen.has(command.name)) {
      result.errors.push(`${where}: duplicate subcommand "${command.name}"`);
    }
    seen.add(command.name);
  }
}
