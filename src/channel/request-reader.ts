/**
 * STL Relay: Request Reader
 *
 * Pull-based request sequence for one connection. `next()` resolves with the
 * next payload, or null once the client sent ENDTRANSMISSION. The socket is
 * paused while completed payloads wait unread, so a slow consumer holds the
 * client back instead of buffering without bound.
 *
 * A connection that ends, errors or times out before ENDTRANSMISSION makes
 * `next()` reject (after every already completed payload was handed out);
 * the request that was still being assembled is discarded.
 *
 * Aborting `signal` fails the reader at once: payloads not yet handed out are
 * dropped along with the partial request.
 */

import type * as net from 'node:net';
import { ConnectionError, FramingError, ReadTimeoutError } from '../shared/errors.js';
import { LineFramer } from './line-framer.js';
import { RequestAssembler } from './request-assembler.js';

export interface RequestReaderOptions {
  /** 0 disables the idle timeout. */
  idleTimeoutMs?: number;
  signal?: AbortSignal;
}

export class RequestReader implements AsyncIterable<string> {
  private readonly framer = new LineFramer();
  private readonly assembler = new RequestAssembler();
  private readonly ready: string[] = [];
  private ended = false;
  private failure: Error | null = null;
  private waiter: (() => void) | null = null;
  private readonly idleTimeoutMs: number;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly socket: net.Socket,
    options: RequestReaderOptions = {},
  ) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
    this.signal = options.signal;

    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onClose);
    socket.on('error', this.onError);
    socket.on('timeout', this.onTimeout);

    if (this.signal?.aborted) {
      this.onAbort();
      return;
    }
    this.signal?.addEventListener('abort', this.onAbort, { once: true });
    this.listen();
  }

  async next(): Promise<string | null> {
    for (;;) {
      const payload = this.ready.shift();
      if (payload !== undefined) {
        if (this.ready.length === 0 && !this.ended && this.failure === null) {
          this.listen();
        }
        return payload;
      }

      if (this.ended) return null;
      if (this.failure) throw this.failure;

      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    for (;;) {
      const payload = await this.next();
      if (payload === null) return;
      yield payload;
    }
  }

  /** Stop listening to the socket. Does not close it. */
  detach(): void {
    this.socket.off('data', this.onData);
    this.socket.off('end', this.onEnd);
    this.socket.off('close', this.onClose);
    this.socket.off('error', this.onError);
    this.socket.off('timeout', this.onTimeout);
    this.signal?.removeEventListener('abort', this.onAbort);
    this.socket.setTimeout(0);
  }

  /** Read from the client; the idle clock only runs here. */
  private listen(): void {
    if (this.idleTimeoutMs > 0) this.socket.setTimeout(this.idleTimeoutMs);
    this.socket.resume();
  }

  /** Stop reading while the consumer catches up. */
  private hold(): void {
    this.socket.pause();
    if (this.idleTimeoutMs > 0) this.socket.setTimeout(0);
  }

  private readonly onData = (chunk: Buffer): void => {
    if (this.ended || this.failure) return;

    for (const line of this.framer.push(chunk)) {
      const event = this.assembler.accept(line);
      if (event.type === 'payload') {
        this.ready.push(event.payload);
      } else if (event.type === 'end') {
        if (event.payload !== null) this.ready.push(event.payload);
        this.ended = true;
        break;
      }
    }

    if (this.ended || this.ready.length > 0) {
      this.hold();
      this.wake();
    }
  };

  private readonly onEnd = (): void => {
    this.disconnected('Client closed the connection');
  };

  private readonly onClose = (): void => {
    this.disconnected('Connection closed');
  };

  private readonly onError = (err: Error): void => {
    this.fail(new ConnectionError(`Socket error: ${err.message}`, err));
  };

  private readonly onTimeout = (): void => {
    this.fail(new ReadTimeoutError(this.idleTimeoutMs));
    this.socket.destroy();
  };

  private readonly onAbort = (): void => {
    const reason: unknown = this.signal?.reason;
    this.ready.length = 0;
    this.ended = false;
    this.failure = new ConnectionError(
      `Read aborted${typeof reason === 'string' ? ` (${reason})` : ''}`,
      reason,
    );
    this.framer.reset();
    this.hold();
    this.wake();
  };

  private disconnected(reason: string): void {
    if (this.ended) return;
    const partialLine = this.framer.hasPartialLine();
    const discarded = this.assembler.pendingLineCount;
    this.fail(
      new FramingError(
        `${reason} before ENDTRANSMISSION` +
          (partialLine ? ' (inside an unterminated line)' : '') +
          (discarded > 0 ? `; discarded ${discarded} content line(s)` : ''),
        partialLine,
      ),
    );
  }

  private fail(error: Error): void {
    if (this.ended || this.failure) return;
    this.failure = error;
    this.framer.reset();
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
