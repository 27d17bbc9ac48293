import type { LiteralValue } from '@core/types/spec';
import { display, fromJSON, lookupPath, NULL, str, toJSON, type Value } from '@core/types/value';
import type { ResolverBackend, TemplateSegment } from '@core/evaluation/ExpressionResolver';
import { interpreterLogger as logger } from '@core/utils/logger';

/**
 * Resolves expressions to live values. Flags are bound to their effective
 * string value, steps to their result map.
 */
export class ValueBackend implements ResolverBackend<Value, string, Value> {
  constructor(private readonly positional: readonly string[]) {}

  literal(value: LiteralValue): Value {
    // Non-finite numbers become null, as they do in JSON
    return fromJSON(value);
  }

  flag(binding: string): Value {
    return str(binding);
  }

  arg(position: number): Value {
    return position < this.positional.length ? str(this.positional[position]) : NULL;
  }

  step(binding: Value, path: readonly string[], name: string): Value {
    const lookup = lookupPath(binding, path);
    if (lookup.missingAt !== undefined) {
      logger.debug('Step path did not resolve, using null', {
        step: name,
        path: path.join('.'),
        missing: path.slice(0, lookup.missingAt + 1).join('.')
      });
    }
    return lookup.value;
  }

  template(segments: ReadonlyArray<TemplateSegment<Value>>): Value {
    return str(segments.map(segment => (segment.kind === 'text' ? segment.text : display(segment.value))).join(''));
  }

  object(entries: ReadonlyArray<readonly [string, Value]>): Value {
    // Round-trip through a plain object so key order matches generated programs
    return fromJSON(Object.fromEntries(entries.map(([key, value]) => [key, toJSON(value)])));
  }

  jsonEncode(value: Value): Value {
    return str(JSON.stringify(toJSON(value)));
  }
}
