/**
 * STL Relay: Channel Client
 *
 * The sending side of the protocol: encodes a batch of payloads as one
 * transmission and collects the stl:<path> answers until the server hangs up.
 */

import * as net from 'node:net';
import { ConnectionError, ProtocolError, ReadTimeoutError } from '../shared/errors.js';
import { LOCALHOST } from '../shared/types.js';
import { LineFramer } from './line-framer.js';
import {
  BEGIN_TRANSMISSION_SIGNAL,
  END_TRANSMISSION_SIGNAL,
  LINE_TERMINATOR,
  PAYLOAD_LINE_SEPARATOR,
  REQUEST_COMPLETE_SIGNAL,
  RESULT_PREFIX,
  TRANSMISSION_SEPARATOR_SIGNAL,
  isSentinel,
} from './protocol.js';

export interface SubmitOptions {
  host?: string;
  port: number;
  /** Give up when the server is silent this long. Default 30s. */
  timeoutMs?: number;
}

/**
 * Wire text for a batch: each payload bracketed by BEGINTRANSMISSION /
 * NEWTRANSMISSION, the batch closed by ENDTRANSMISSION.
 *
 * Throws ProtocolError for payloads the server could not reproduce: a CR
 * anywhere, or a line that reads as a control line.
 */
export function encodeTransmission(payloads: readonly string[]): string {
  const lines: string[] = [];

  for (const payload of payloads) {
    if (payload.includes('\r')) {
      throw new ProtocolError('Payload must not contain a carriage return');
    }
    const content = payload.split(PAYLOAD_LINE_SEPARATOR);
    const collision = content.find(isSentinel);
    if (collision !== undefined) {
      throw new ProtocolError(`Payload line "${collision}" would be read as a control line`);
    }
    lines.push(BEGIN_TRANSMISSION_SIGNAL, ...content, TRANSMISSION_SEPARATOR_SIGNAL);
  }
  lines.push(END_TRANSMISSION_SIGNAL);

  return lines.map((line) => line + LINE_TERMINATOR).join('');
}

/**
 * Results announced by the server, in order. A result counts only when its
 * stl: line directly follows REQUESTCOMPLETE.
 */
export function parseResponses(lines: readonly string[]): string[] {
  const results: string[] = [];
  let completed = false;

  for (const line of lines) {
    if (line === REQUEST_COMPLETE_SIGNAL) {
      completed = true;
      continue;
    }
    if (completed && line.startsWith(RESULT_PREFIX)) {
      results.push(line.slice(RESULT_PREFIX.length));
    }
    completed = false;
  }

  return results;
}

/**
 * Send `payloads` over one connection and resolve with the server's results
 * once it closes the connection.
 */
export function submitRequests(options: SubmitOptions, payloads: readonly string[]): Promise<string[]> {
  const host = options.host ?? LOCALHOST;
  const timeoutMs = options.timeoutMs ?? 30000;
  const wire = encodeTransmission(payloads);

  return new Promise<string[]>((resolve, reject) => {
    const framer = new LineFramer();
    const lines: string[] = [];
    let settled = false;

    const socket = net.createConnection({ host, port: options.port }, () => {
      socket.write(wire);
    });
    socket.setTimeout(timeoutMs);

    const finish = (error: Error | null): void => {
      if (settled) return;
      settled = true;
      socket.removeAllListeners();
      socket.destroy();
      if (error) reject(error);
      else resolve(parseResponses(lines));
    };

    socket.on('data', (chunk: Buffer) => {
      lines.push(...framer.push(chunk));
    });

    socket.on('timeout', () => finish(new ReadTimeoutError(timeoutMs)));

    socket.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ECONNREFUSED') {
        finish(new ConnectionError(`Connection refused on ${host}:${options.port}`, err));
      } else {
        finish(new ConnectionError(`TCP error: ${err.message}`, err));
      }
    });

    socket.on('close', () => finish(null));
  });
}
