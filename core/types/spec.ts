/**
 * Parsed CLI specification tree.
 *
 * Every node is plain data; the loader in `@services/ParserService` produces it
 * from a document and both backends consume it without mutating it.
 */

export type OutputFormat = 'json' | 'table' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'text'];

export interface Specification {
  name: string;
  description?: string;
  /** Global flags, bound once at the root and visible to every command */
  flags: FlagSpec[];
  commands: CommandSpec[];
}

export interface CommandSpec {
  name: string;
  description?: string;
  /** Declaration order decides positional binding */
  args: ArgSpec[];
  flags: FlagSpec[];
  action?: ActionSpec;
  commands: CommandSpec[];
}

export interface FlagSpec {
  name: string;
  short?: string;
  default?: string;
  /** Environment variable that replaces the default when set and non-empty */
  env?: string;
  description?: string;
  required?: boolean;
}

export interface ArgSpec {
  name: string;
  required?: boolean;
}

export interface ActionSpec {
  steps: StepSpec[];
  output?: OutputSpec;
}

export interface StepSpec {
  name: string;
  method?: string;
  url: Expression;
  headers?: Expression;
  body?: Expression;
}

export interface OutputSpec {
  /** Kept as a string so unsupported formats can be reported by name */
  format?: string;
  data?: Expression;
  columns?: string[];
}

// Expressions

export type Namespace = 'flag' | 'arg' | 'step';

export const NAMESPACES: readonly Namespace[] = ['flag', 'arg', 'step'];

export type LiteralValue = string | number | boolean | null;

export interface LiteralExpression {
  readonly type: 'literal';
  readonly value: LiteralValue;
}

export interface ReferenceExpression {
  readonly type: 'reference';
  readonly namespace: Namespace;
  readonly name: string;
  /** Nested lookup under a step result, e.g. ['body', 'data', 'keys'] */
  readonly path: readonly string[];
}

export interface CallExpression {
  readonly type: 'call';
  readonly name: 'jsonencode';
  readonly argument: Expression;
}

export interface TextPart {
  readonly type: 'text';
  readonly text: string;
}

export type TemplatePart = TextPart | ReferenceExpression | CallExpression;

export interface TemplateExpression {
  readonly type: 'template';
  readonly parts: readonly TemplatePart[];
}

export interface ObjectEntry {
  readonly key: string;
  readonly value: Expression;
}

export interface ObjectExpression {
  readonly type: 'object';
  readonly entries: readonly ObjectEntry[];
}

export type Expression =
  | LiteralExpression
  | ReferenceExpression
  | TemplateExpression
  | ObjectExpression
  | CallExpression;

export function literal(value: LiteralValue): LiteralExpression {
  return { type: 'literal', value };
}

export function reference(namespace: Namespace, name: string, ...path: string[]): ReferenceExpression {
  return { type: 'reference', namespace, name, path };
}

export function template(...parts: Array<string | ReferenceExpression | CallExpression>): TemplateExpression {
  return {
    type: 'template',
    parts: parts.map(part => (typeof part === 'string' ? { type: 'text', text: part } : part))
  };
}

export function objectOf(entries: Record<string, Expression>): ObjectExpression {
  return {
    type: 'object',
    entries: Object.entries(entries).map(([key, value]) => ({ key, value }))
  };
}

export function jsonencode(argument: Expression): CallExpression {
  return { type: 'call', name: 'jsonencode', argument };
}
