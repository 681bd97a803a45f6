/**
 * STL Relay: Response Writer
 *
 * Tells a client its request is done: REQUESTCOMPLETE, then stl:<result>.
 * The connection stays open; closing it is the Channel Server's job.
 */

import { ProtocolError } from '../shared/errors.js';
import type { ChannelConnection } from './connection.js';
import { LINE_TERMINATOR, REQUEST_COMPLETE_SIGNAL, RESULT_PREFIX } from './protocol.js';

export function formatResponse(result: string): string {
  if (/[\r\n]/.test(result)) {
    throw new ProtocolError('Response result must fit on one line');
  }
  return `${REQUEST_COMPLETE_SIGNAL}${LINE_TERMINATOR}${RESULT_PREFIX}${result}${LINE_TERMINATOR}`;
}

export async function writeResponse(connection: ChannelConnection, result: string): Promise<void> {
  await connection.write(formatResponse(result));
}
