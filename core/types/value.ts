/**
 * Runtime values flowing through the interpreter: step results, resolved
 * expressions and output data. Arbitrary JSON-shaped data is modelled as a
 * closed tagged variant so every consumer handles each shape explicitly.
 */

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ListValue
  | MapValue;

export interface NullValue {
  readonly kind: 'null';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface MapValue {
  readonly kind: 'map';
  /** Keys in the order the JSON decoder produced them */
  readonly entries: ReadonlyMap<string, Value>;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export const NULL: NullValue = { kind: 'null' };

export function bool(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function num(value: number): NumberValue {
  return { kind: 'number', value };
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function list(items: readonly Value[]): ListValue {
  return { kind: 'list', items };
}

export function map(entries: Iterable<readonly [string, Value]>): MapValue {
  return { kind: 'map', entries: new Map(entries) };
}

export function isMap(value: Value): value is MapValue {
  return value.kind === 'map';
}

/**
 * Convert decoded JSON (or any plain data) into a Value. Anything that is not
 * JSON-shaped (functions, symbols, undefined) becomes null.
 */
export function fromJSON(data: unknown): Value {
  if (data === null || data === undefined) {
    return NULL;
  }
  if (typeof data === 'string') {
    return str(data);
  }
  if (typeof data === 'number') {
    return Number.isFinite(data) ? num(data) : NULL;
  }
  if (typeof data === 'boolean') {
    return bool(data);
  }
  if (Array.isArray(data)) {
    return list(data.map(item => fromJSON(item)));
  }
  if (typeof data === 'object') {
    return map(Object.entries(data).map(([key, item]) => [key, fromJSON(item)] as const));
  }
  return NULL;
}

export function toJSON(value: Value): JsonValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'list':
      return value.items.map(item => toJSON(item));
    case 'map':
      // fromEntries defines "__proto__" as an own key instead of setting the prototype
      return Object.fromEntries([...value.entries].map(([key, item]) => [key, toJSON(item)] as const));
  }
}

/**
 * Default representation used for template interpolation, text output and
 * table cells: strings verbatim, null as empty text, scalars via String(),
 * lists and maps as compact JSON.
 */
export function display(value: Value): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'string':
      return value.value;
    case 'bool':
    case 'number':
      return String(value.value);
    case 'list':
    case 'map':
      return JSON.stringify(toJSON(value));
  }
}

export interface PathLookup {
  value: Value;
  /** Index of the first segment that could not be followed, if any */
  missingAt?: number;
}

/**
 * Walk `path` one key at a time. Hitting a non-map or a missing key yields null
 * and records where the walk stopped.
 */
export function lookupPath(value: Value, path: readonly string[]): PathLookup {
  let current = value;
  for (let index = 0; index < path.length; index++) {
    if (current.kind !== 'map') {
      return { value: NULL, missingAt: index };
    }
    const next = current.entries.get(path[index]);
    if (next === undefined) {
      return { value: NULL, missingAt: index };
    }
    current = next;
  }
  return { value: current };
}
