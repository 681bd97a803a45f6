/**
 * STL Relay: Configuration Loading
 *
 * Loads RelayConfig from ~/.stl-relay/config.json (or a .yaml/.yml file).
 * Returns defaults when the file is missing or corrupt.
 */

import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { PATHS, isYamlPath } from './paths.js';
import { type ChannelConfig, type RelayConfig, DEFAULT_CONFIG } from './types.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPort(value: unknown): value is number {
  return Number.isInteger(value) && typeof value === 'number' && value >= 0 && value <= 65535;
}

function isNonNegativeInteger(value: unknown): value is number {
  return Number.isInteger(value) && typeof value === 'number' && value >= 0;
}

/**
 * Load relay configuration.
 * File values override defaults one field at a time. Missing or corrupt file → all defaults.
 */
export function loadConfig(filePath: string = PATHS.config): RelayConfig {
  try {
    if (!fs.existsSync(filePath)) {
      return structuredClone(DEFAULT_CONFIG);
    }

    const raw = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = isYamlPath(filePath)
      ? yaml.load(raw, { schema: yaml.JSON_SCHEMA })
      : JSON.parse(raw);

    if (!isPlainObject(parsed)) {
      return structuredClone(DEFAULT_CONFIG);
    }

    return validateConfig(parsed);
  } catch {
    // Corrupt config file: use defaults silently
    return structuredClone(DEFAULT_CONFIG);
  }
}

/**
 * Build a RelayConfig from the parsed file contents.
 * Invalid values fall back to defaults from DEFAULT_CONFIG.
 */
function validateConfig(source: PlainObject): RelayConfig {
  const config = structuredClone(DEFAULT_CONFIG);

  // Validate channel
  const channel = source['channel'];
  if (isPlainObject(channel)) {
    if (typeof channel['host'] === 'string' && channel['host'].length > 0) {
      config.channel.host = channel['host'];
    }
    if (isPort(channel['port'])) {
      config.channel.port = channel['port'];
    }
    if (isNonNegativeInteger(channel['backlog']) && channel['backlog'] > 0) {
      config.channel.backlog = channel['backlog'];
    }
    if (isNonNegativeInteger(channel['idle_timeout_ms'])) {
      config.channel.idle_timeout_ms = channel['idle_timeout_ms'];
    }
    if (typeof channel['send_responses'] === 'boolean') {
      config.channel.send_responses = channel['send_responses'];
    }
  }

  // Validate log
  const log = source['log'];
  if (isPlainObject(log) && typeof log['file'] === 'string' && log['file'].length > 0) {
    config.log.file = log['file'];
  }

  // Validate converter
  const converter = source['converter'];
  if (isPlainObject(converter)) {
    if (typeof converter['command'] === 'string' && converter['command'].length > 0) {
      config.converter.command = converter['command'];
    }
    const args = converter['args'];
    if (Array.isArray(args) && args.every((a): a is string => typeof a === 'string')) {
      config.converter.args = args;
    }
    if (typeof converter['work_dir'] === 'string' && converter['work_dir'].length > 0) {
      config.converter.work_dir = converter['work_dir'];
    }
    if (isNonNegativeInteger(converter['timeout_ms']) && converter['timeout_ms'] > 0) {
      config.converter.timeout_ms = converter['timeout_ms'];
    }
  }

  return config;
}

/**
 * Project the [channel] and [log] sections onto the frozen listening config.
 */
export function toChannelConfig(config: RelayConfig): ChannelConfig {
  return Object.freeze({
    host: config.channel.host,
    port: config.channel.port,
    backlog: config.channel.backlog,
    idleTimeoutMs: config.channel.idle_timeout_ms,
    ...(config.log.file !== undefined ? { logFile: config.log.file } : {}),
  });
}
