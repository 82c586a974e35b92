/**
 * Incremental line framing for upstream SSE bytes. Chunk boundaries may fall
 * anywhere, including inside a multi-byte character or a line; only whole
 * lines are handed out.
 */
export class LineBuffer {
  private readonly decoder = new TextDecoder();
  private pendingLine = "";

  push(chunk: Uint8Array): string[] {
    this.pendingLine += this.decoder.decode(chunk, { stream: true });
    const lines = this.pendingLine.split("\n");
    this.pendingLine = lines.pop() ?? "";
    return lines.map(stripCr);
  }

  /** Flushes the decoder; an unterminated last line is complete at end of stream. */
  finish(): string[] {
    const rest = this.pendingLine + this.decoder.decode();
    this.pendingLine = "";
    return rest ? [stripCr(rest)] : [];
  }
}

function stripCr(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
