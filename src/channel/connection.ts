/**
 * STL Relay: Channel Connection
 *
 * Handle for one accepted client socket. The Channel Server owns it; request
 * consumers only see it to address a response back to the client.
 */

import type * as net from 'node:net';
import { ConnectionError } from '../shared/errors.js';

export class ChannelConnection {
  readonly remoteAddress: string;
  readonly remotePort: number;
  private closing: Promise<void> | null = null;

  constructor(
    readonly id: number,
    readonly socket: net.Socket,
  ) {
    this.remoteAddress = socket.remoteAddress ?? 'unknown';
    this.remotePort = socket.remotePort ?? 0;
  }

  /** host:port of the client, for log lines. */
  get label(): string {
    return `${this.remoteAddress}:${this.remotePort}`;
  }

  get isOpen(): boolean {
    return this.closing === null && !this.socket.destroyed && this.socket.writable;
  }

  write(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.isOpen) {
        reject(new ConnectionError(`Connection to ${this.label} is closed`));
        return;
      }
      this.socket.write(data, 'utf8', (err) => {
        if (err) reject(new ConnectionError(`Write to ${this.label} failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  /**
   * Flush pending writes, shut down both directions and release the socket.
   * Later calls return the same promise.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;

    this.closing = new Promise<void>((resolve) => {
      const socket = this.socket;
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      if (socket.writable) {
        socket.end(() => socket.destroy());
      } else {
        socket.destroy();
      }
    });
    return this.closing;
  }

  /** Drop the socket without flushing. */
  abort(): void {
    this.socket.destroy();
  }
}
