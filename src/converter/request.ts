/**
 * STL Relay: Conversion Request Decoding
 *
 * A payload is a JSON object:
 *
 *   { "image": "data:image/png;base64,...", "stl": "/out/shape.stl",
 *     "scale": 0.1, "size": 256, "border": 100,
 *     "negative": false, "smooth": true, "base": false }
 *
 * `image` and `stl` are required; the rest fall back to the defaults below.
 */

import { RequestError } from '../shared/errors.js';
import { safeJsonParse } from '../shared/safe-json.js';
import type { ConversionRequest } from '../shared/types.js';
import { parseDataUri } from './data-uri.js';

export const CONVERSION_DEFAULTS = {
  scale: 0.1,
  size: 256,
  border: 100,
  negative: false,
  smooth: true,
  includeBase: false,
} as const;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(data: JsonObject, key: string): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new RequestError(`"${key}" must be a number`);
  }
  return n;
}

function readBoolean(data: JsonObject, key: string, fallback: boolean): boolean {
  const value = data[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === 't') return true;
    if (normalized === 'false' || normalized === 'f') return false;
  }
  throw new RequestError(`"${key}" must be true or false`);
}

function readRequiredString(data: JsonObject, key: string): string {
  const value = data[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new RequestError(`"${key}" is required`);
  }
  return value;
}

export function parseConversionRequest(payload: string): ConversionRequest {
  const data = safeJsonParse(payload, null);
  if (!isJsonObject(data)) {
    throw new RequestError('Request payload is not a JSON object');
  }

  const stlPath = readRequiredString(data, 'stl');
  if (/[\r\n]/.test(stlPath)) {
    throw new RequestError('"stl" must not contain line breaks');
  }
  const image = parseDataUri(readRequiredString(data, 'image'));

  // Non-positive size or scale reverts to the default
  const size = Math.trunc(readNumber(data, 'size') ?? CONVERSION_DEFAULTS.size);
  const scale = readNumber(data, 'scale') ?? CONVERSION_DEFAULTS.scale;
  const border = Math.trunc(readNumber(data, 'border') ?? CONVERSION_DEFAULTS.border);

  if (border < 0) {
    throw new RequestError('"border" must not be negative');
  }

  return {
    image: image.data,
    imageParameters: image.parameters,
    stlPath,
    includeBase: readBoolean(data, 'base', CONVERSION_DEFAULTS.includeBase),
    smooth: readBoolean(data, 'smooth', CONVERSION_DEFAULTS.smooth),
    negative: readBoolean(data, 'negative', CONVERSION_DEFAULTS.negative),
    border,
    size: size > 0 ? size : CONVERSION_DEFAULTS.size,
    scale: scale > 0 ? scale : CONVERSION_DEFAULTS.scale,
  };
}
