/**
 * STL Relay: Line Framer
 *
 * Splits a byte stream into CRLF-terminated lines. Pure state machine: feed
 * it chunks as they arrive, get back the lines they completed.
 *
 * Byte rules:
 *   CR            held as a pending terminator, never part of a line
 *   LF after CR   completes the line
 *   anything else drops a pending CR, then joins the line (a bare LF included)
 *
 * A CR that is not followed by LF therefore disappears from the output.
 */

import { CR, LF } from './protocol.js';

export class LineFramer {
  private parts: Buffer[] = [];
  private carriageReturnPending = false;

  /**
   * Consume a chunk and return every line it completed, in order,
   * decoded as UTF-8 and without its terminator.
   */
  push(chunk: Uint8Array): string[] {
    const bytes = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    const lines: string[] = [];
    let segmentStart = 0;

    for (let i = 0; i < bytes.length; i++) {
      const byte = bytes[i];

      if (byte === CR) {
        this.keep(bytes, segmentStart, i);
        segmentStart = i + 1;
        this.carriageReturnPending = true;
      } else if (byte === LF && this.carriageReturnPending) {
        lines.push(Buffer.concat(this.parts).toString('utf8'));
        this.parts = [];
        segmentStart = i + 1;
        this.carriageReturnPending = false;
      } else {
        this.carriageReturnPending = false;
      }
    }

    this.keep(bytes, segmentStart, bytes.length);
    return lines;
  }

  /** Whether bytes are buffered that no terminator has closed yet. */
  hasPartialLine(): boolean {
    return this.carriageReturnPending || this.parts.length > 0;
  }

  reset(): void {
    this.parts = [];
    this.carriageReturnPending = false;
  }

  private keep(bytes: Buffer, start: number, end: number): void {
    if (end > start) {
      this.parts.push(Buffer.from(bytes.subarray(start, end)));
    }
  }
}
