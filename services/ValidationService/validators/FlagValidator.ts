import { Option } from 'commander';
import type { CommandSpec, FlagSpec, Specification } from '@core/types/spec';
import type { ValidationResult } from '../IValidationService';

const FLAG_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const SHORT_ALIAS = /^[A-Za-z0-9]$/;
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Flag names share one namespace across the whole specification, and so do
 * short aliases. Commander stores each flag under its attribute name
 * (`my-flag` and `myFlag` both become `myFlag`, `no-x` becomes `x`), so those
 * keys must be unique as well.
 */
export function validateFlags(spec: Specification, result: ValidationResult): void {
  const names = new Map<string, string>();
  const shorts = new Map<string, string>();
  const keys = new Map<string, { flag: string; owner: string }>();

  const visit = (flags: FlagSpec[], owner: string) => {
    for (const flag of flags) {
      if (!FLAG_NAME.test(flag.name)) {
        result.errors.push(`${owner}: invalid flag name "${flag.name}"`);
        continue;
      }
      const previous = names.get(flag.name);
      if (previous !== undefined) {
        result.errors.push(`${owner}: flag "${flag.name}" already declared by ${previous}`);
      } else {
        names.set(flag.name, owner);
        const key = new Option(`--${flag.name} <value>`).attributeName();
        const holder = keys.get(key);
        if (holder !== undefined) {
          result.errors.push(
            `${owner}: flag "${flag.name}" shares the option key "${key}" with flag "${holder.flag}" (${holder.owner})`
          );
        } else {
          keys.set(key, { flag: flag.name, owner });
        }
      }

      if (flag.short !== undefined) {
        if (!SHORT_ALIAS.test(flag.short)) {
          result.errors.push(`${owner}: short alias "${flag.short}" of flag "${flag.name}" must be a single letter or digit`);
        } else {
          const taken = shorts.get(flag.short);
          if (taken !== undefined) {
            result.errors.push(`${owner}: short alias "-${flag.short}" of flag "${flag.name}" is already used by flag "${taken}"`);
          } else {
            shorts.set(flag.short, flag.name);
          }
        }
      }

      if (flag.env !== undefined && !ENV_NAME.test(flag.env)) {
        result.errors.push(`${owner}: flag "${flag.name}" names an invalid environment variable "${flag.env}"`);
      }
      if (flag.name === 'help' || flag.short === 'h') {
        result.errors.push(`${owner}: flag "${flag.name}" collides with the built-in help option`);
      }
    }
  };

  const walk = (command: CommandSpec, path: string[]) => {
    visit(command.flags, `command "${path.join(' ')}"`);
    for (const child of command.commands) {
      walk(child, [...path, child.name]);
    }
  };

  visit(spec.flags, 'global flags');
  for (const command of spec.commands) {
    walk(command, [command.name]);
  }
}
