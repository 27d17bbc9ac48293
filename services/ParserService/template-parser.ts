import {
  literal,
  NAMESPACES,
  type CallExpression,
  type Expression,
  type Namespace,
  type ReferenceExpression,
  type TemplatePart
} from '@core/types/spec';

/**
 * Template strings interpolate references with `${namespace.name.path}`:
 *
 *   "${flag.address}/v1/secret/data/${arg.path}"
 *   "${step.list.body.data.keys}"
 *   "${jsonencode(step.read.body)}"
 *
 * `$${` writes a literal `${`. A string that is exactly one interpolation
 * becomes the bare reference, keeping its value's type; a string without any
 * interpolation is a literal.
 */

export class TemplateSyntaxError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

const SEGMENT = /^[^\s.{}()]+$/;
const CALL = /^([A-Za-z_][A-Za-z0-9_]*)\((.*)\)$/s;

export function parseTemplate(source: string): Expression {
  const parts: TemplatePart[] = [];
  let text = '';
  let index = 0;

  while (index < source.length) {
    if (source.startsWith('$${', index)) {
      text += '${';
      index += 3;
      continue;
    }
    if (source.startsWith('${', index)) {
      const close = source.indexOf('}', index + 2);
      if (close === -1) {
        throw new TemplateSyntaxError(`unterminated interpolation starting at offset ${index}`, index);
      }
      if (text) {
        parts.push({ type: 'text', text });
        text = '';
      }
      parts.push(parseInterpolation(source.slice(index + 2, close), index));
      index = close + 1;
      continue;
    }
    text += source[index];
    index++;
  }
  if (text) {
    parts.push({ type: 'text', text });
  }

  if (parts.length === 0) {
    return literal('');
  }
  if (parts.length === 1) {
    const [only] = parts;
    return only.type === 'text' ? literal(only.text) : only;
  }
  return { type: 'template', parts };
}

function parseInterpolation(body: string, offset: number): ReferenceExpression | CallExpression {
  const content = body.trim();
  const call = CALL.exec(content);
  if (call) {
    if (call[1] !== 'jsonencode') {
      throw new TemplateSyntaxError(`unknown function "${call[1]}"`, offset);
    }
    return { type: 'call', name: 'jsonencode', argument: parseReference(call[2].trim(), offset) };
  }
  return parseReference(content, offset);
}

/**
 * Parse `namespace.name[.path...]`.
 */
export function parseReference(content: string, offset = 0): ReferenceExpression {
  const segments = content.split('.');
  const [head, name, ...path] = segments;
  const namespace = toNamespace(head);
  if (!namespace) {
    throw new TemplateSyntaxError(
      `unknown namespace "${head}" in "\${${content}}" (expected ${NAMESPACES.join(', ')})`,
      offset
    );
  }
  if (name === undefined || segments.some(segment => !SEGMENT.test(segment))) {
    throw new TemplateSyntaxError(`malformed reference "\${${content}}"`, offset);
  }
  if (namespace !== 'step' && path.length > 0) {
    throw new TemplateSyntaxError(`only step references take a path: "\${${content}}"`, offset);
  }
  return { type: 'reference', namespace, name, path };
}

function toNamespace(value: string): Namespace | undefined {
  return NAMESPACES.find(namespace => namespace === value);
}
