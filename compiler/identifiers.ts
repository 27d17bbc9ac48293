/**
 * Convert a flag, step or command name to PascalCase, treating every
 * non-alphanumeric character as a word boundary: `my-flag`, `my_flag` and
 * `my.flag` all give `MyFlag`.
 */
export function toPascalCase(name: string): string {
  const words = name.split(/[^A-Za-z0-9]+/).filter(Boolean);
  if (words.length === 0) {
    return 'Value';
  }
  return words.map(word => word[0].toUpperCase() + word.slice(1)).join('');
}

/**
 * Hands out unique identifiers. A second request for the same identifier gets
 * a numeric suffix, starting at 2.
 */
export class IdentifierAllocator {
  private readonly taken = new Set<string>();

  constructor(reserved: Iterable<string> = []) {
    for (const name of reserved) {
      this.taken.add(name);
    }
  }

  allocate(prefix: string, name: string, suffix = ''): string {
    const base = `${prefix}${toPascalCase(name)}`;
    let candidate = `${base}${suffix}`;
    for (let counter = 2; this.taken.has(candidate); counter++) {
      candidate = `${base}${counter}${suffix}`;
    }
    this.taken.add(candidate);
    return candidate;
  }
}
