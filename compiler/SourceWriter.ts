/**
 * Line-oriented source builder with two-space indentation.
 */
export class SourceWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  line(text = ''): this {
    this.lines.push(text ? `${'  '.repeat(this.depth)}${text}` : '');
    return this;
  }

  indent(): this {
    this.depth++;
    return this;
  }

  dedent(): this {
    this.depth = Math.max(0, this.depth - 1);
    return this;
  }

  /** Write `open`, the body one level deeper, then `close` */
  block(open: string, body: () => void, close = '}'): this {
    this.line(open).indent();
    body();
    return this.dedent().line(close);
  }

  raw(text: string): this {
    for (const line of text.split('\n')) {
      this.line(line);
    }
    return this;
  }

  toString(): string {
    return `${this.lines.join('\n')}\n`;
  }
}
