#!/usr/bin/env node
/**
 * STL Relay: entry point. Reads ~/.stl-relay/config.json and serves until
 * SIGINT or SIGTERM.
 */

import { installProcessHooks } from './channel/lifecycle.js';
import { ShutdownContext } from './channel/shutdown.js';
import { loadConfig } from './shared/config.js';
import { createLogger } from './shared/logger.js';
import { type RunningRelay, startRelay } from './relay/service.js';

const log = createLogger('main');
const context = new ShutdownContext();
installProcessHooks(context);

let relay: RunningRelay | null = null;
try {
  relay = await startRelay(loadConfig(), { context });
} catch {
  // startRelay logged the cause and released what it opened
  process.exitCode = 1;
}

if (relay) {
  try {
    await relay.finished;
  } catch (err) {
    log.error('Relay stopped unexpectedly:', err);
    process.exitCode = 1;
    context.close('relay crashed');
  }
}
