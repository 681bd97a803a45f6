/**
 * STL Relay: Shared Type Definitions
 *
 * Configuration shapes shared by the channel, the converter and the entry point.
 */

import { PATHS } from './paths.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ChannelSection {
  host: string;
  port: number;
  /** Max connections waiting while another one is served */
  backlog: number;
  /** 0 = wait forever for the client */
  idle_timeout_ms: number;
  /** Answer each converted request with REQUESTCOMPLETE + stl:<path> */
  send_responses: boolean;
}

export interface LogSection {
  /** Absent = standard output */
  file?: string;
}

export interface ConverterSection {
  /** Executable taking the image and STL paths as its last two arguments */
  command?: string;
  /** Extra arguments placed before the generated ones */
  args: string[];
  work_dir: string;
  timeout_ms: number;
}

export interface RelayConfig {
  channel: ChannelSection;
  log: LogSection;
  converter: ConverterSection;
}

/** Listening parameters; frozen once a ChannelServer is built from them. */
export interface ChannelConfig {
  readonly host: string;
  readonly port: number;
  readonly backlog: number;
  readonly idleTimeoutMs: number;
  /** Append-mode log file; standard output when absent */
  readonly logFile?: string;
}

export const LOCALHOST = '127.0.0.1';
export const DEFAULT_PORT_NUMBER = 65535;
export const DEFAULT_MAX_QUEUED_CONNECTIONS = 5;

export const DEFAULT_CONFIG: RelayConfig = {
  channel: {
    host: LOCALHOST,
    port: DEFAULT_PORT_NUMBER,
    backlog: DEFAULT_MAX_QUEUED_CONNECTIONS,
    idle_timeout_ms: 0,
    send_responses: true,
  },
  log: {},
  converter: {
    args: [],
    work_dir: PATHS.work,
    timeout_ms: 120000,
  },
};

// =============================================================================
// Conversion requests
// =============================================================================

export interface ConversionRequest {
  /** Decoded image bytes (PNG, JPEG, ...) */
  image: Buffer;
  /** Media type and other data URI parameters, in order */
  imageParameters: DataUriParameter[];
  /** Where the converter must write the STL file */
  stlPath: string;
  includeBase: boolean;
  smooth: boolean;
  negative: boolean;
  border: number;
  size: number;
  scale: number;
}

export type DataUriParameter = string | readonly [attribute: string, value: string];
