const ANSI_ESCAPE = /\u001b(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, "");
}

/**
 * Buffers partial chunks of one output stream and emits complete lines.
 * rpm-ostree redraws progress with bare carriage returns, so CR counts as a
 * terminator as well as LF and CRLF.
 */
export class LineSplitter {
  private pending = "";

  constructor(private readonly emit: (line: string) => void) {}

  push(chunk: string): void {
    const text = this.pending + chunk;
    const parts = text.split(/\r\n|\n|\r/);
    this.pending = parts.pop() ?? "";
    for (const part of parts) {
      this.emitLine(part);
    }
  }

  flush(): void {
    const rest = this.pending;
    this.pending = "";
    this.emitLine(rest);
  }

  private emitLine(raw: string): void {
    const line = stripAnsi(raw).trimEnd();
    if (line.trim().length > 0) {
      this.emit(line);
    }
  }
}
