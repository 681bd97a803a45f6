/**
 * STL Relay: Lifecycle Hooks
 *
 * Ties a ShutdownContext to the process: normal exit, SIGINT and SIGTERM
 * all close it. The context's latch makes every trigger after the first a
 * no-op, so a signal followed by the resulting exit cleans up once.
 */

import type { EventEmitter } from 'node:events';
import { createLogger } from '../shared/logger.js';
import type { ShutdownContext } from './shutdown.js';

const log = createLogger('lifecycle');

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/**
 * Register the cleanup triggers on `target` (the process by default).
 * Returns a function that removes them again.
 */
export function installProcessHooks(
  context: ShutdownContext,
  target: EventEmitter = process,
): () => void {
  const onExit = (): void => {
    context.close('process exit');
  };

  const onSignal = (signal: ShutdownSignal): void => {
    if (context.isClosed) return;
    log.info(`Received ${signal}, shutting down`);
    context.close(`signal ${signal}`);
  };

  const signalListeners = SHUTDOWN_SIGNALS.map((signal) => {
    const listener = (): void => onSignal(signal);
    target.on(signal, listener);
    return { signal, listener };
  });
  target.on('exit', onExit);

  return () => {
    target.off('exit', onExit);
    for (const { signal, listener } of signalListeners) {
      target.off(signal, listener);
    }
  };
}
