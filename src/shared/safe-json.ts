/**
 * STL Relay: Safe JSON parsing utility
 *
 * Keeps one malformed payload from throwing through the request loop.
 */

import { createLogger } from './logger.js';

const log = createLogger('safe-json');

/**
 * Parse JSON safely. Returns fallback on parse error instead of throwing.
 * Logs a warning on failure to aid debugging.
 */
export function safeJsonParse(raw: string, fallback: unknown): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    log.warn(`Failed to parse JSON, using fallback. Raw: ${raw.slice(0, 100)}`, err);
    return fallback;
  }
}
