import { describe, it, expect } from 'vitest';
import { jsonencode, literal, objectOf, reference, template } from '@core/types/spec';
import { fromJSON, toJSON, str, NULL } from '@core/types/value';
import { resolveExpression } from '@core/evaluation';
import { ExpressionReferenceError } from '@core/errors';
import { Environment } from '@interpreter/env/Environment';

function environment() {
  const env = new Environment(new Map([['address', 'H']]), ['P'], ['path', 'version']);
  env.addStepResult('list', fromJSON({ body: { data: { keys: ['a', 'b'] } }, status: 200 }));
  return env;
}

function resolve(expression: Parameters<typeof resolveExpression>[0]) {
  const env = environment();
  return resolveExpression(expression, env.scope(), env.backend);
}

describe('ValueBackend', () => {
  it('renders flag and arg templates', () => {
    const url = template(reference('flag', 'address'), '/v1/secret/data/', reference('arg', 'path'));
    expect(resolve(url)).toEqual(str('H/v1/secret/data/P'));
  });

  it('resolves omitted optional args to null and renders them empty', () => {
    expect(resolve(reference('arg', 'version'))).toEqual(NULL);
    expect(resolve(template('v=', reference('arg', 'version')))).toEqual(str('v='));
  });

  it('walks nested step paths', () => {
    expect(toJSON(resolve(reference('step', 'list', 'body', 'data', 'keys')))).toEqual(['a', 'b']);
    expect(toJSON(resolve(reference('step', 'list', 'status')))).toBe(200);
  });

  it('yields null when an intermediate key is missing or not a map', () => {
    expect(resolve(reference('step', 'list', 'body', 'nope', 'keys'))).toEqual(NULL);
    expect(resolve(reference('step', 'list', 'status', 'code'))).toEqual(NULL);
  });

  it('stringifies non-string values inside templates', () => {
    expect(resolve(template('keys=', reference('step', 'list', 'body', 'data', 'keys'), ' status=', reference('step', 'list', 'status')))).toEqual(
      str('keys=["a","b"] status=200')
    );
  });

  it('orders object keys as plain objects do', () => {
    const value = resolve(objectOf({ b: literal(1), 2: literal(2), a: reference('flag', 'address') }));
    expect(value.kind === 'map' && Array.from(value.entries.keys())).toEqual(['2', 'b', 'a']);
    expect(toJSON(value)).toEqual({ 2: 2, b: 1, a: 'H' });
  });

  it('encodes values as compact JSON', () => {
    expect(resolve(jsonencode(reference('step', 'list', 'body')))).toEqual(str('{"data":{"keys":["a","b"]}}'));
  });

  it('rejects steps that have not run yet', () => {
    expect(() => resolve(reference('step', 'later'))).toThrow(ExpressionReferenceError);
  });
});
