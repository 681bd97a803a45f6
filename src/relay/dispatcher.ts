/**
 * STL Relay: Request Dispatcher
 *
 * Drains the channel: decode each payload, convert it, answer the client.
 * A failed request is logged and skipped; the client gets no answer for it
 * and the next request is served as usual.
 */

import type { ChannelRequest, ChannelServer } from '../channel/server.js';
import { writeResponse } from '../channel/response.js';
import { parseConversionRequest } from '../converter/request.js';
import type { Converter } from '../converter/types.js';
import { createLogger } from '../shared/logger.js';
import { recordRequest } from '../shared/metrics.js';

const log = createLogger('relay');

export interface RelayOptions {
  server: ChannelServer;
  converter: Converter;
  /** Write REQUESTCOMPLETE + stl:<path> after each conversion. Default true. */
  sendResponses?: boolean;
}

export interface RelaySummary {
  handled: number;
  failed: number;
}

/**
 * Handle a single request. Resolves with the STL path, or null when the
 * request failed (the failure is logged).
 */
export async function handleRequest(
  request: ChannelRequest,
  converter: Converter,
  sendResponses = true,
): Promise<string | null> {
  const { connection, sequence } = request;
  const startMs = Date.now();

  try {
    const conversion = parseConversionRequest(request.payload);
    log.info(`Request #${sequence} from ${connection.label}: ${conversion.image.length} image bytes → ${conversion.stlPath}`);

    const stlPath = await converter.convert(conversion);

    if (sendResponses) {
      await writeResponse(connection, stlPath);
    }

    recordRequest(Date.now() - startMs, true);
    log.info(`Request #${sequence} from ${connection.label} complete: ${stlPath}`);
    return stlPath;
  } catch (err) {
    recordRequest(Date.now() - startMs, false);
    log.error(`Request #${sequence} from ${connection.label} failed:`, err);
    return null;
  }
}

/**
 * Serve requests until the channel's shutdown context closes.
 */
export async function runRelay(options: RelayOptions): Promise<RelaySummary> {
  const summary: RelaySummary = { handled: 0, failed: 0 };
  const sendResponses = options.sendResponses ?? true;

  for await (const request of options.server.acceptLoop()) {
    const result = await handleRequest(request, options.converter, sendResponses);
    if (result === null) summary.failed++;
    else summary.handled++;
  }

  log.info(`Relay stopped: ${summary.handled} handled, ${summary.failed} failed`);
  return summary;
}
