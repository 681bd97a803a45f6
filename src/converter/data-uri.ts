/**
 * STL Relay: Data URI Parsing
 *
 *   data:[<media type>;][<attribute>=<value>;]...base64,<data>
 *
 * Only base64-encoded data is accepted; that is what browsers produce for
 * canvas and file uploads.
 */

import { RequestError } from '../shared/errors.js';
import type { DataUriParameter } from '../shared/types.js';

const DATA_URI_HEADER = 'data:';

export interface DataUri {
  parameters: DataUriParameter[];
  data: Buffer;
}

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

export function parseDataUri(uri: string): DataUri {
  if (!uri.startsWith(DATA_URI_HEADER)) {
    throw new RequestError('Invalid data uri scheme: missing "data:" header');
  }

  const dataStart = uri.indexOf(',', DATA_URI_HEADER.length);
  if (dataStart === -1) {
    throw new RequestError('Invalid data uri scheme: missing "," before the data');
  }

  const parameters: DataUriParameter[] = uri
    .slice(DATA_URI_HEADER.length, dataStart)
    .split(';')
    .filter((part) => part.length > 0)
    .map((part): DataUriParameter => {
      const eq = part.indexOf('=');
      return eq === -1 ? part : [part.slice(0, eq), part.slice(eq + 1)];
    });

  if (parameters[parameters.length - 1] !== 'base64') {
    throw new RequestError('Unknown data uri encoding: only base64 is supported');
  }

  const body = uri.slice(dataStart + 1).replace(/\s+/g, '');
  if (!BASE64_BODY.test(body)) {
    throw new RequestError('Data uri body is not valid base64');
  }

  return { parameters, data: Buffer.from(body, 'base64') };
}

/** The media type parameter, if the URI named one. */
export function mediaTypeOf(parameters: readonly DataUriParameter[]): string | null {
  const first = parameters[0];
  return typeof first === 'string' && first.includes('/') ? first : null;
}
