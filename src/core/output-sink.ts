// src/core/output-sink.ts

/**
 * Append-only text sink for command output, usage text, the help listing and
 * diagnostics. `process.stdout` satisfies it.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * In-memory sink. Used by tests and by callers that want to capture a
 * command's output instead of printing it.
 */
export class BufferedOutput implements OutputSink {
  private chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    const text = this.toString();
    if (text === '') {
      return [];
    }
    return text.replace(/\n$/, '').split('\n');
  }

  clear(): void {
    this.chunks = [];
  }
}
