const INDENT = '    ';

/** Line-oriented Rust source builder with brace-tracked indentation. */
export class RustWriter {
  private readonly out: string[] = [];
  private level = 0;

  line(text = ''): this {
    this.out.push(text ? INDENT.repeat(this.level) + text : '');
    return this;
  }

  lines(texts: readonly string[]): this {
    for (const t of texts) this.line(t);
    return this;
  }

  /** Blank separator line; never doubled and never leading. */
  gap(): this {
    if (this.out.length && this.out[this.out.length - 1] !== '') this.out.push('');
    return this;
  }

  open(head: string): this {
    this.line(`${head} {`);
    this.level++;
    return this;
  }

  close(tail = ''): this {
    this.level = Math.max(0, this.level - 1);
    return this.line(`}${tail}`);
  }

  /**
   * Re-indents a multi-line snippet at the current level. The first line is
   * taken as-is; later lines lose their common leading whitespace.
   */
  snippet(text: string): this {
    const [first, ...rest] = text.split(/\r?\n/);
    const indents = rest.filter((l) => l.trim()).map((l) => l.length - l.trimStart().length);
    const common = indents.length ? Math.min(...indents) : 0;
    this.line(first.trim());
    for (const l of rest) this.line(l.slice(common).trimEnd());
    return this;
  }

  toString(): string {
    while (this.out.length && this.out[this.out.length - 1] === '') this.out.pop();
    return this.out.length ? `${this.out.join('\n')}\n` : '';
  }
}
