/**
 * @file writer.ts
 * @description Text sinks for the console tool.
 */

/**
 * Destination for text output (stdout, stderr, or an in-memory buffer).
 */
export interface Writer {
  write(s: string): void;
}

/**
 * Collects everything written; used where output is inspected afterwards.
 */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }
}

export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}

export class ErrorWriter implements Writer {
  write(s: string): void {
    process.stderr.write(s);
  }
}

/** Write each entry followed by a newline */
export function writeLines(w: Writer, lines: readonly string[]): void {
  for (const line of lines) {
    w.write(line);
    w.write('\n');
  }
}
