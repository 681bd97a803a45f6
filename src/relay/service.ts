/**
 * STL Relay: Service Startup
 *
 * Wires config, converter and channel together under one shutdown
 * context. Setup failures are logged, release whatever was already opened,
 * and are rethrown for the caller to turn into an exit status.
 */

import { ChannelServer } from '../channel/server.js';
import { ShutdownContext } from '../channel/shutdown.js';
import { CommandConverter } from '../converter/command-converter.js';
import type { Converter } from '../converter/types.js';
import { toChannelConfig } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import { getMetrics } from '../shared/metrics.js';
import type { RelayConfig } from '../shared/types.js';
import { type RelaySummary, runRelay } from './dispatcher.js';

const log = createLogger('service');

export interface StartRelayOptions {
  /** Defaults to a CommandConverter built from config.converter */
  converter?: Converter;
  /** Defaults to a fresh context; pass one to share it with process hooks */
  context?: ShutdownContext;
}

export interface RunningRelay {
  server: ChannelServer;
  context: ShutdownContext;
  /** Settles once the context closes and the current connection is released */
  finished: Promise<RelaySummary>;
}

export async function startRelay(config: RelayConfig, options: StartRelayOptions = {}): Promise<RunningRelay> {
  const context = options.context ?? new ShutdownContext();

  try {
    const converter = options.converter ?? CommandConverter.fromConfig(config.converter);
    const server = new ChannelServer(toChannelConfig(config), context);
    await server.bind();
    context.onClose('metrics dump', () => log.info('Metrics dump:', getMetrics()));

    const finished = runRelay({
      server,
      converter,
      sendResponses: config.channel.send_responses,
    });
    return { server, context, finished };
  } catch (err) {
    log.error('Relay setup failed:', err);
    context.close('setup failed');
    throw err;
  }
}
