/**
 * Line-oriented text buffer for the generated documents. Every line ends
 * with `\n` regardless of platform so output is byte-for-byte reproducible.
 */
export class DocumentWriter {
  private readonly lines: string[] = [];

  writeLine(line: string = ''): this {
    this.lines.push(line);
    return this;
  }

  /** Write a multi-line block, one output line per input line */
  writeBlock(block: string): this {
    for (const line of block.split('\n')) {
      this.lines.push(line);
    }
    return this;
  }

  toString(): string {
    return this.lines.map(line => `${line}\n`).join('');
  }
}
