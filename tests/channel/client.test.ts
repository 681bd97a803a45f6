/**
 * STL Relay: Channel Client Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'node:net';
import { encodeTransmission, parseResponses, submitRequests } from '../../src/channel/client.js';
import { ConnectionError, ProtocolError, ReadTimeoutError } from '../../src/shared/errors.js';

// =============================================================================
// Helpers
// =============================================================================

const servers: net.Server[] = [];
const accepted: net.Socket[] = [];

afterEach(async () => {
  // close() waits for open connections, including ones a handler never touched
  for (const socket of accepted.splice(0)) socket.destroy();
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
  );
});

/** Loopback server that hands every connection to `handler`. */
function listen(handler: (socket: net.Socket) => void): Promise<number> {
  return new Promise((resolve) => {
    const server = net.createServer((socket) => {
      accepted.push(socket);
      handler(socket);
    });
    servers.push(server);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(address && typeof address === 'object' ? address.port : 0);
    });
  });
}

/** A port nothing listens on. */
function closedPort(): Promise<number> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      server.close(() => resolve(port));
    });
  });
}

// =============================================================================
// encodeTransmission
// =============================================================================

describe('encodeTransmission', () => {
  it('brackets a single payload and closes the batch', () => {
    expect(encodeTransmission(['{"a":1}'])).toBe(
      'BEGINTRANSMISSION\r\n{"a":1}\r\nNEWTRANSMISSION\r\nENDTRANSMISSION\r\n',
    );
  });

  it('sends only ENDTRANSMISSION for an empty batch', () => {
    expect(encodeTransmission([])).toBe('ENDTRANSMISSION\r\n');
  });

  it('puts each line of a multi-line payload on its own wire line', () => {
    expect(encodeTransmission(['{\n"a": 1\n}', 'x'])).toBe(
      'BEGINTRANSMISSION\r\n{\r\n"a": 1\r\n}\r\nNEWTRANSMISSION\r\n' +
        'BEGINTRANSMISSION\r\nx\r\nNEWTRANSMISSION\r\n' +
        'ENDTRANSMISSION\r\n',
    );
  });

  it('rejects a payload containing a carriage return', () => {
    expect(() => encodeTransmission(['a\rb'])).toThrow(ProtocolError);
  });

  it('rejects a payload line that reads as a control line', () => {
    expect(() => encodeTransmission(['ok\nENDTRANSMISSION'])).toThrow(
      'Payload line "ENDTRANSMISSION" would be read as a control line',
    );
  });
});

// =============================================================================
// parseResponses
// =============================================================================

describe('parseResponses', () => {
  it('collects results announced by REQUESTCOMPLETE, in order', () => {
    const lines = ['REQUESTCOMPLETE', 'stl:/out/a.stl', 'REQUESTCOMPLETE', 'stl:/out/b.stl'];
    expect(parseResponses(lines)).toEqual(['/out/a.stl', '/out/b.stl']);
  });

  it('ignores stl: lines that do not follow REQUESTCOMPLETE', () => {
    expect(parseResponses(['stl:/stray.stl', 'noise', 'REQUESTCOMPLETE', 'noise', 'stl:/late.stl'])).toEqual([]);
  });
});

// =============================================================================
// submitRequests
// =============================================================================

describe('submitRequests', () => {
  it('sends the encoded batch and resolves with the results once the server hangs up', async () => {
    let wire = '';
    const port = await listen((socket) => {
      socket.setEncoding('utf8');
      socket.on('data', (chunk: string) => {
        wire += chunk;
        if (wire.endsWith('ENDTRANSMISSION\r\n')) {
          socket.end('REQUESTCOMPLETE\r\nstl:/out/one.stl\r\n');
        }
      });
    });

    const results = await submitRequests({ port }, ['{"stl":"one.stl"}']);

    expect(results).toEqual(['/out/one.stl']);
    expect(wire).toBe('BEGINTRANSMISSION\r\n{"stl":"one.stl"}\r\nNEWTRANSMISSION\r\nENDTRANSMISSION\r\n');
  });

  it('resolves with no results when the server answers nothing', async () => {
    const port = await listen((socket) => {
      socket.on('data', () => socket.end());
    });

    await expect(submitRequests({ port }, ['x'])).resolves.toEqual([]);
  });

  it('rejects with ConnectionError when nothing listens on the port', async () => {
    const port = await closedPort();

    const error = await submitRequests({ port }, ['x']).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty('message', `Connection refused on 127.0.0.1:${port}`);
  });

  it('rejects with ReadTimeoutError when the server stays silent', async () => {
    const port = await listen(() => undefined);

    await expect(submitRequests({ port, timeoutMs: 50 }, ['x'])).rejects.toBeInstanceOf(ReadTimeoutError);
    expect(accepted).toHaveLength(1);
  });

  it('refuses to send a payload it cannot encode', () => {
    expect(() => submitRequests({ port: 1 }, ['BEGINTRANSMISSION'])).toThrow(ProtocolError);
  });
});
