/**
 * STL Relay: Request Assembler
 *
 * Turns the framed lines of one connection into request payloads.
 *
 *   BEGINTRANSMISSION  start capturing content lines
 *   NEWTRANSMISSION    emit the payload (even when empty), stop capturing
 *   ENDTRANSMISSION    emit what is left, if anything, and finish
 *
 * Content lines seen while not capturing are dropped. NEWTRANSMISSION does
 * not re-arm capturing: the next request needs its own BEGINTRANSMISSION.
 */

import {
  BEGIN_TRANSMISSION_SIGNAL,
  END_TRANSMISSION_SIGNAL,
  PAYLOAD_LINE_SEPARATOR,
  TRANSMISSION_SEPARATOR_SIGNAL,
} from './protocol.js';

export type AssemblerEvent =
  | { type: 'none' }
  | { type: 'payload'; payload: string }
  | { type: 'end'; payload: string | null };

const NONE: AssemblerEvent = { type: 'none' };

export class RequestAssembler {
  private lines: string[] = [];
  private transmissionActive = false;
  private finished = false;

  get isFinished(): boolean {
    return this.finished;
  }

  get isTransmissionActive(): boolean {
    return this.transmissionActive;
  }

  /** Content lines captured for the request in progress. */
  get pendingLineCount(): number {
    return this.lines.length;
  }

  accept(line: string): AssemblerEvent {
    if (this.finished) return NONE;

    if (line === END_TRANSMISSION_SIGNAL) {
      this.finished = true;
      const rest = this.drain();
      return { type: 'end', payload: rest.length > 0 ? rest : null };
    }

    if (line === BEGIN_TRANSMISSION_SIGNAL) {
      this.transmissionActive = true;
      return NONE;
    }

    if (line === TRANSMISSION_SEPARATOR_SIGNAL) {
      this.transmissionActive = false;
      return { type: 'payload', payload: this.drain() };
    }

    if (this.transmissionActive) {
      this.lines.push(line);
    }
    return NONE;
  }

  private drain(): string {
    const payload = this.lines.join(PAYLOAD_LINE_SEPARATOR);
    this.lines = [];
    return payload;
  }
}
