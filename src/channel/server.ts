/**
 * STL Relay: Channel Server
 *
 * Owns the listening socket and serves one client at a time: a connection's
 * whole request sequence is drained, and the connection closed, before the
 * next queued one is looked at. Connections that arrive meanwhile wait
 * (unread) in a queue of at most `backlog` entries.
 *
 * Per-connection failures are logged and never end the accept loop; only the
 * shutdown context does.
 */

import * as net from 'node:net';
import { FramingError, ReadTimeoutError, SetupError } from '../shared/errors.js';
import { closeLogSink, createLogger, openLogSink, setLogSink } from '../shared/logger.js';
import { type ConnectionOutcome, recordConnection } from '../shared/metrics.js';
import type { ChannelConfig } from '../shared/types.js';
import { ChannelConnection } from './connection.js';
import { RequestReader } from './request-reader.js';
import type { ShutdownContext } from './shutdown.js';

const log = createLogger('channel');

/** One payload, plus the connection it came from so it can be answered. */
export interface ChannelRequest {
  connection: ChannelConnection;
  payload: string;
  /** 1-based position of the payload within its connection */
  sequence: number;
}

export class ChannelServer {
  readonly config: ChannelConfig;
  private server: net.Server | null = null;
  private readonly pending: net.Socket[] = [];
  private acceptor: ((socket: net.Socket | null) => void) | null = null;
  private active: ChannelConnection | null = null;
  private nextConnectionId = 1;

  constructor(
    config: ChannelConfig,
    private readonly context: ShutdownContext,
  ) {
    this.config = Object.freeze({ ...config });
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bound address; useful when the configured port is 0. */
  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Open the configured log file, then create the listening socket. Rejects
   * with SetupError (and logs it) when the address cannot be bound. Both are
   * released when the shutdown context closes.
   */
  bind(): Promise<void> {
    const { host, port, backlog } = this.config;

    if (this.server) {
      return Promise.reject(new SetupError('Channel is already bound'));
    }
    if (this.context.isClosed) {
      return Promise.reject(new SetupError('Channel was shut down before it was bound'));
    }

    if (this.config.logFile !== undefined) {
      setLogSink(openLogSink(this.config.logFile));
      this.context.onClose('log sink', closeLogSink);
    }

    return new Promise<void>((resolve, reject) => {
      const server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true });

      const onListenError = (err: Error): void => {
        const error = new SetupError(`Cannot listen on ${host}:${port}: ${err.message}`, err);
        log.error('socket error:', error.message);
        reject(error);
      };

      server.once('error', onListenError);
      server.on('connection', this.onConnection);

      server.listen({ host, port, backlog }, () => {
        server.off('error', onListenError);
        server.on('error', (err) => log.error('Listener error:', err));
        this.server = server;
        this.context.onClose('channel listener', () => this.shutdown());

        const bound = this.address();
        log.info(`listening on ${bound ? `${bound.address}:${bound.port}` : `${host}:${port}`}`);
        resolve();
      });
    });
  }

  /**
   * Serve connections in arrival order, yielding each request payload as it
   * is completed. Ends when the shutdown context closes.
   */
  async *acceptLoop(): AsyncGenerator<ChannelRequest, void, undefined> {
    if (!this.server) {
      throw new SetupError('bind() must succeed before acceptLoop()');
    }

    for (;;) {
      const socket = await this.nextSocket();
      if (!socket) return;

      if (socket.destroyed) {
        log.info(`Queued client ${socket.remoteAddress ?? 'unknown'} left before it was served`);
        continue;
      }

      const connection = new ChannelConnection(this.nextConnectionId++, socket);
      const reader = new RequestReader(socket, {
        idleTimeoutMs: this.config.idleTimeoutMs,
        signal: this.context.signal,
      });
      const startMs = Date.now();
      let served = 0;
      let outcome: ConnectionOutcome = 'completed';

      this.active = connection;
      log.info(`connected to ${connection.label}`);

      try {
        while (!this.context.signal.aborted) {
          let payload: string | null;
          try {
            payload = await reader.next();
          } catch (err) {
            outcome = this.reportFailure(connection, err);
            break;
          }
          if (payload === null) break;

          served++;
          yield { connection, payload, sequence: served };
        }
        // Payloads still buffered when shutdown began are never handed out
        if (this.context.signal.aborted && outcome === 'completed') {
          outcome = 'shutdown';
          log.info(`Connection to ${connection.label} aborted by shutdown`);
        }
      } finally {
        reader.detach();
        this.active = null;
        await connection.close();
        recordConnection(outcome, served, Date.now() - startMs);
        log.info(`connection to ${connection.label} is closed (${served} request(s))`);
      }
    }
  }

  private readonly onConnection = (socket: net.Socket): void => {
    const label = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    socket.on('error', (err) => log.debug(`Socket error from ${label}:`, err.message));

    if (this.context.isClosed) {
      socket.destroy();
      return;
    }

    if (this.acceptor) {
      const acceptor = this.acceptor;
      this.acceptor = null;
      acceptor(socket);
      return;
    }

    if (this.pending.length >= this.config.backlog) {
      log.warn(`Refusing ${label}: ${this.pending.length} connection(s) already queued`);
      socket.destroy();
      return;
    }

    this.pending.push(socket);
    socket.once('close', () => {
      const index = this.pending.indexOf(socket);
      if (index !== -1) this.pending.splice(index, 1);
    });
  };

  private nextSocket(): Promise<net.Socket | null> {
    if (this.context.isClosed) return Promise.resolve(null);

    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);

    return new Promise((resolve) => {
      this.acceptor = resolve;
    });
  }

  private reportFailure(connection: ChannelConnection, err: unknown): ConnectionOutcome {
    if (this.context.isClosed) {
      log.info(`Connection to ${connection.label} aborted by shutdown`);
      return 'shutdown';
    }
    if (err instanceof FramingError || err instanceof ReadTimeoutError) {
      log.warn(`Dropping ${connection.label}:`, err.message);
      return err instanceof FramingError ? 'framing' : 'timeout';
    }
    log.error(`Connection to ${connection.label} failed:`, err);
    return 'error';
  }

  /** Release the listener and every client socket. Runs from the shutdown context. */
  private shutdown(): void {
    const server = this.server;
    if (server?.listening) {
      server.close();
    }

    for (const socket of this.pending.splice(0)) {
      socket.destroy();
    }
    this.active?.abort();

    const acceptor = this.acceptor;
    this.acceptor = null;
    acceptor?.(null);
  }
}
