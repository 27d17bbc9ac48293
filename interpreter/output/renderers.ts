import type { OutputFormat } from '@core/types/spec';
import { display, toJSON, NULL, type Value } from '@core/types/value';
import { RenderError } from '@core/errors';

export function renderJSON(value: Value): string {
  return `${JSON.stringify(toJSON(value), null, 2)}\n`;
}

/**
 * Tab-separated table. Columns are the explicit list, or the keys of the first
 * record in decoder order. Rows that are not records are skipped; absent keys
 * give empty cells.
 */
export function renderTable(value: Value, columns: readonly string[] = []): string {
  if (value.kind !== 'list') {
    throw new RenderError('table output requires an array', 'table');
  }
  let header = columns;
  const first = value.items[0];
  if (header.length === 0 && first?.kind === 'map') {
    header = Array.from(first.entries.keys());
  }
  if (header.length === 0) {
    return '';
  }

  const lines = [header.join('\t')];
  for (const row of value.items) {
    if (row.kind !== 'map') {
      continue;
    }
    lines.push(header.map(column => display(row.entries.get(column) ?? NULL)).join('\t'));
  }
  return lines.map(line => `${line}\n`).join('');
}

export function renderText(value: Value): string {
  return `${display(value)}\n`;
}

export function render(format: OutputFormat, value: Value, columns?: readonly string[]): string {
  switch (format) {
    case 'json':
      return renderJSON(value);
    case 'table':
      return renderTable(value, columns);
    case 'text':
      return renderText(value);
  }
}
