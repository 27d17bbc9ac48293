import type { LiteralValue } from '@core/types/spec';
import type { ResolverBackend, TemplateSegment } from '@core/evaluation/ExpressionResolver';
import type { Feature } from './feature-usage';

/** String literal in generated source */
export function quote(text: string): string {
  return JSON.stringify(text);
}

/**
 * Resolves expressions to source fragments. Flags are bound to the identifier
 * holding their value, steps to the identifier holding their result; `args`
 * is the positional argument array in scope.
 */
export class SourceBackend implements ResolverBackend<string, string, string> {
  constructor(private readonly features: ReadonlySet<Feature>) {}

  literal(value: LiteralValue): string {
    return JSON.stringify(value);
  }

  flag(binding: string): string {
    return binding;
  }

  arg(position: number): string {
    return `(args[${position}] ?? null)`;
  }

  step(binding: string, path: readonly string[]): string {
    if (path.length === 0) {
      return binding;
    }
    this.need('path-lookup');
    return `lookup(${binding}, [${path.map(quote).join(', ')}])`;
  }

  template(segments: ReadonlyArray<TemplateSegment<string>>): string {
    if (segments.length === 0) {
      return '""';
    }
    this.need('display');
    const pieces = segments.map(segment => (segment.kind === 'text' ? quote(segment.text) : `display(${segment.value})`));
    // A lone text segment is already a string
    return pieces.length === 1 && segments[0].kind === 'text' ? pieces[0] : `(${pieces.join(' + ')})`;
  }

  object(entries: ReadonlyArray<readonly [string, string]>): string {
    // A quoted __proto__ key would set the prototype instead of a property
    const properties = entries.map(([key, value]) => `${key === '__proto__' ? `[${quote(key)}]` : quote(key)}: ${value}`);
    return `{ ${properties.join(', ')} }`;
  }

  jsonEncode(value: string): string {
    this.need('json-encode');
    return `jsonEncode(${value})`;
  }

  private need(feature: Feature): void {
    if (!this.features.has(feature)) {
      throw new Error(`support routine "${feature}" was not scheduled for this program`);
    }
  }
}
