/**
 * @description
 * Splits a TCP byte stream into newline-terminated frames.
 *
 * Reads from a stream socket can end anywhere: mid-frame, mid-UTF-8 sequence,
 * or with several frames at once. The framer accumulates chunks and returns
 * only complete segments, holding the trailing partial one for the next push.
 */
export class LineFramer {
  private decoder = new TextDecoder("utf-8");
  private pending = "";

  /**
   * @param maxLineLength Largest partial segment kept before it is discarded, in UTF-8 bytes
   * @param onOverflow Called with the discarded size in bytes when a segment grows past the limit
   */
  constructor(
    private readonly maxLineLength: number = 65536,
    private readonly onOverflow?: (discarded: number) => void
  ) {}

  /**
   * Append a chunk and return every frame it completed, without terminators.
   * Blank lines and a trailing carriage return are dropped.
   */
  push(chunk: Uint8Array | string): string[] {
    this.pending += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });

    const lines: string[] = [];
    let newline = this.pending.indexOf("\n");

    while (newline !== -1) {
      let line = this.pending.slice(0, newline);
      this.pending = this.pending.slice(newline + 1);

      if (line.endsWith("\r")) line = line.slice(0, -1);
      if (line.trim().length > 0) lines.push(line);

      newline = this.pending.indexOf("\n");
    }

    const size = Buffer.byteLength(this.pending, "utf8");
    if (size > this.maxLineLength) {
      this.pending = "";
      this.onOverflow?.(size);
    }

    return lines;
  }

  /**
   * Size of the buffered partial segment in UTF-8 bytes.
   */
  get buffered(): number {
    return Buffer.byteLength(this.pending, "utf8");
  }

  /**
   * Drop any buffered partial segment, e.g. when the connection is replaced.
   */
  reset(): void {
    this.pending = "";
    this.decoder = new TextDecoder("utf-8");
  }
}
