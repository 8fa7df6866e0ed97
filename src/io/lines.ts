// src/io/lines.ts

/**
 * Incremental line splitter. Chunks go in, complete lines come out with their
 * terminators still attached ("\n" or "\r\n"). Whatever follows the last
 * newline is held until more text arrives or `flush` is called.
 */
export class LineSplitter {
  private pending = '';

  push(chunk: string): string[] {
    const text = this.pending + chunk;
    const lines: string[] = [];
    let start = 0;
    let newline = text.indexOf('\n', start);
    while (newline !== -1) {
      lines.push(text.slice(start, newline + 1));
      start = newline + 1;
      newline = text.indexOf('\n', start);
    }
    this.pending = text.slice(start);
    return lines;
  }

  /** Remaining text without a trailing newline, if any. */
  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return rest ? [rest] : [];
  }
}

/** Split a whole string into lines, terminators kept. */
export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.flush()];
}
