/**
 * STL Relay: Channel Wire Protocol
 *
 * Plaintext, CRLF-terminated lines over a stream socket. A client brackets
 * each request with sentinel lines:
 *
 *   BEGINTRANSMISSION
 *   <content line>...
 *   NEWTRANSMISSION        (request complete; send BEGINTRANSMISSION again for the next)
 *   ...
 *   ENDTRANSMISSION        (no more requests on this connection)
 *
 * The server answers a converted request with REQUESTCOMPLETE and stl:<path>.
 */

export const LINE_TERMINATOR = '\r\n';

export const CR = 0x0d;
export const LF = 0x0a;

export const BEGIN_TRANSMISSION_SIGNAL = 'BEGINTRANSMISSION';
export const TRANSMISSION_SEPARATOR_SIGNAL = 'NEWTRANSMISSION';
export const END_TRANSMISSION_SIGNAL = 'ENDTRANSMISSION';

export const REQUEST_COMPLETE_SIGNAL = 'REQUESTCOMPLETE';
export const RESULT_PREFIX = 'stl:';

/** Joins the content lines of one payload. */
export const PAYLOAD_LINE_SEPARATOR = '\n';

export type Sentinel =
  | typeof BEGIN_TRANSMISSION_SIGNAL
  | typeof TRANSMISSION_SEPARATOR_SIGNAL
  | typeof END_TRANSMISSION_SIGNAL;

const SENTINELS: ReadonlySet<string> = new Set<Sentinel>([
  BEGIN_TRANSMISSION_SIGNAL,
  TRANSMISSION_SEPARATOR_SIGNAL,
  END_TRANSMISSION_SIGNAL,
]);

export function isSentinel(line: string): line is Sentinel {
  return SENTINELS.has(line);
}
