/**
 * Line-oriented source builder with block indentation.
 */
export class CodeWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  constructor(private readonly indentUnit = '  ') {}

  line(text = ''): this {
    this.lines.push(text.length > 0 ? this.indentUnit.repeat(this.depth) + text : '');
    return this;
  }

  blank(): this {
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] !== '') this.lines.push('');
    return this;
  }

  block(open: string, body: () => void, close = '}'): this {
    this.line(open);
    this.depth++;
    body();
    this.depth--;
    return this.line(close);
  }

  /**
   * Emit `///` doc lines as a JSDoc block.
   */
  doc(lines: readonly string[]): this {
    if (lines.length === 0) return this;
    const safe = lines.map((l) => l.replace(/\*\//g, '*\\/'));
    if (safe.length === 1) return this.line(`/** ${safe[0] ?? ''} */`);
    this.line('/**');
    for (const l of safe) this.line(l.length > 0 ? ` * ${l}` : ' *');
    return this.line(' */');
  }

  toString(lineEnding = '\n'): string {
    const out = [...this.lines];
    while (out.length > 0 && out[out.length - 1] === '') out.pop();
    return out.join(lineEnding) + lineEnding;
  }
}
