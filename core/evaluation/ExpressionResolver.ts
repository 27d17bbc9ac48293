import type { Expression, LiteralValue, TemplatePart } from '@core/types/spec';
import { ExpressionReferenceError } from '@core/errors';
import type { ScopeTable } from './scope';

export type TemplateSegment<T> =
  | { kind: 'text'; text: string }
  | { kind: 'value'; value: T };

/**
 * What a backend contributes to expression resolution. The walk over the
 * expression tree, scope checks and error reporting are shared; a backend only
 * says how each resolved piece is represented.
 */
export interface ResolverBackend<T, F, S> {
  literal(value: LiteralValue): T;
  flag(binding: F, name: string): T;
  /** `position` may lie past the supplied arguments when an optional arg is omitted */
  arg(position: number, name: string): T;
  /** Path lookup into a step result; an empty path is the whole result */
  step(binding: S, path: readonly string[], name: string): T;
  /** Concatenate segments, stringifying values with the default representation */
  template(segments: ReadonlyArray<TemplateSegment<T>>): T;
  /** Entries arrive de-duplicated, in first-seen key order */
  object(entries: ReadonlyArray<readonly [string, T]>): T;
  jsonEncode(value: T): T;
}

/**
 * Resolve `expression` against `scope`.
 *
 * @param site Describes where the expression sits, used in reference errors
 * @throws ExpressionReferenceError when a flag, arg or step is not in scope
 */
export function resolveExpression<T, F, S>(
  expression: Expression,
  scope: ScopeTable<F, S>,
  backend: ResolverBackend<T, F, S>,
  site?: string
): T {
  switch (expression.type) {
    case 'literal':
      return backend.literal(expression.value);

    case 'reference': {
      if (expression.namespace === 'flag') {
        const binding = scope.flags.get(expression.name);
        if (binding === undefined) {
          throw new ExpressionReferenceError('flag', expression.name, [...scope.flags.keys()], site);
        }
        return backend.flag(binding, expression.name);
      }
      if (expression.namespace === 'arg') {
        const position = scope.args.get(expression.name);
        if (position === undefined) {
          throw new ExpressionReferenceError('arg', expression.name, [...scope.args.keys()], site);
        }
        return backend.arg(position, expression.name);
      }
      const binding = scope.steps.get(expression.name);
      if (binding === undefined) {
        throw new ExpressionReferenceError('step', expression.name, [...scope.steps.keys()], site);
      }
      return backend.step(binding, expression.path, expression.name);
    }

    case 'template':
      return backend.template(
        expression.parts.map(part => resolveTemplatePart(part, scope, backend, site))
      );

    case 'object': {
      // Later duplicates replace the value but keep the first position
      const entries = new Map<string, T>();
      for (const entry of expression.entries) {
        entries.set(entry.key, resolveExpression(entry.value, scope, backend, site));
      }
      return backend.object([...entries]);
    }

    case 'call':
      return backend.jsonEncode(resolveExpression(expression.argument, scope, backend, site));
  }
}

function resolveTemplatePart<T, F, S>(
  part: TemplatePart,
  scope: ScopeTable<F, S>,
  backend: ResolverBackend<T, F, S>,
  site: string | undefined
): TemplateSegment<T> {
  if (part.type === 'text') {
    return { kind: 'text', text: part.text };
  }
  return { kind: 'value', value: resolveExpression(part, scope, backend, site) };
}

/**
 * Every reference an expression makes, in source order.
 */
export function collectReferences(expression: Expression): Array<Extract<Expression, { type: 'reference' }>> {
  switch (expression.type) {
    case 'literal':
      return [];
    case 'reference':
      return [expression];
    case 'template':
      return expression.parts.flatMap(part => (part.type === 'text' ? [] : collectReferences(part)));
    case 'object':
      return expression.entries.flatMap(entry => collectReferences(entry.value));
    case 'call':
      return collectReferences(expression.argument);
  }
}
