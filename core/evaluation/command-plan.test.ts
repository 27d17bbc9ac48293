import { describe, it, expect } from 'vitest';
import { literal, type Specification } from '@core/types/spec';
import { RenderError } from '@core/errors';
import {
  planProgram,
  usageString,
  arityRule,
  satisfiesArity,
  arityMessage,
  requiredFlagMessage,
  visibleFlags,
  walkCommands
} from './command-plan';

describe('arity policy', () => {
  const oneRequired = arityRule([{ name: 'path', required: true }]);
  const requiredAndOptional = arityRule([{ name: 'path', required: true }, { name: 'version' }]);

  it('requires exactly R when every arg is required', () => {
    expect(oneRequired).toEqual({ kind: 'exact', count: 1 });
    expect(satisfiesArity(oneRequired, 0)).toBe(false);
    expect(satisfiesArity(oneRequired, 1)).toBe(true);
    expect(satisfiesArity(oneRequired, 2)).toBe(false);
  });

  it('requires at least R when any arg is optional, with no upper bound', () => {
    expect(requiredAndOptional).toEqual({ kind: 'minimum', count: 1 });
    expect(satisfiesArity(requiredAndOptional, 0)).toBe(false);
    expect(satisfiesArity(requiredAndOptional, 1)).toBe(true);
    expect(satisfiesArity(requiredAndOptional, 2)).toBe(true);
    expect(satisfiesArity(requiredAndOptional, 5)).toBe(true);
  });

  it('treats a command without args as exactly zero', () => {
    expect(arityRule([])).toEqual({ kind: 'exact', count: 0 });
  });

  it('words violations the same for numbers and source fragments', () => {
    expect(arityMessage(oneRequired, 2)).toBe('accepts 1 arg, received 2');
    expect(arityMessage({ kind: 'exact', count: 0 }, 1)).toBe('accepts 0 args, received 1');
    expect(arityMessage({ kind: 'minimum', count: 2 }, '${args.length}')).toBe(
      'requires at least 2 args, only received ${args.length}'
    );
  });

  it('lists missing required flags', () => {
    expect(requiredFlagMessage(['token', 'address'])).toBe('required flag(s) "token", "address" not set');
  });
});

describe('usageString', () => {
  it('brackets optional args and angle-brackets required ones', () => {
    expect(usageString('get', [{ name: 'path', required: true }, { name: 'version' }])).toBe('get <path> [version]');
    expect(usageString('list', [])).toBe('list');
  });
});

describe('planProgram', () => {
  const spec: Specification = {
    name: 'vault',
    flags: [{ name: 'address' }],
    commands: [
      {
        name: 'kv',
        args: [],
        flags: [{ name: 'mount' }],
        commands: [
          {
            name: 'get',
            args: [{ name: 'path', required: true }],
            flags: [{ name: 'field' }],
            commands: [],
            action: {
              steps: [{ name: 'read', method: 'post', url: literal('http://h') }],
              output: {}
            }
          }
        ]
      }
    ]
  };

  it('plans groups without arity and leaves with usage, arity and defaults', () => {
    const program = planProgram(spec);
    const [kv] = program.root.children;
    const [get] = kv.children;

    expect(kv.usage).toBe('kv');
    expect(kv.arity).toBeUndefined();
    expect(get.path).toEqual(['vault', 'kv', 'get']);
    expect(get.usage).toBe('get <path>');
    expect(get.arity).toEqual({ kind: 'exact', count: 1 });
    expect(get.action?.steps[0].method).toBe('POST');
    expect(get.action?.output?.format).toBe('json');
  });

  it('makes globals and own flags visible to a leaf, but not a parent group\'s flags', () => {
    const program = planProgram(spec);
    const get = program.root.children[0].children[0];
    expect(visibleFlags(program, get).map(flag => flag.name)).toEqual(['address', 'field']);
  });

  it('walks parents before children', () => {
    expect([...walkCommands(planProgram(spec).root)].map(command => command.name)).toEqual(['vault', 'kv', 'get']);
  });

  it('rejects unknown output formats', () => {
    const bad: Specification = {
      name: 'x',
      flags: [],
      commands: [{ name: 'y', args: [], flags: [], commands: [], action: { steps: [], output: { format: 'xml' } } }]
    };
    expect(() => planProgram(bad)).toThrow(RenderError);
    expect(() => planProgram(bad)).toThrow('unsupported output format "xml" for command "x y" (expected json, table, text)');
  });
});
