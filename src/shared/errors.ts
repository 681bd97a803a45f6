/**
 * STL Relay: Error Types
 *
 * Typed errors for each subsystem. All extend RelayError.
 */

export class RelayError extends Error {
  constructor(
    message: string,
    public readonly subsystem: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

/** Binding or listening on the configured address failed. */
export class SetupError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'channel', cause);
    this.name = 'SetupError';
  }
}

/** The peer went away before ENDTRANSMISSION. */
export class FramingError extends RelayError {
  constructor(
    message: string,
    public readonly partialLine: boolean,
    cause?: unknown,
  ) {
    super(message, 'channel', cause);
    this.name = 'FramingError';
  }
}

export class ReadTimeoutError extends RelayError {
  constructor(timeoutMs: number) {
    super(`Peer sent nothing for ${timeoutMs}ms`, 'channel');
    this.name = 'ReadTimeoutError';
  }
}

export class ConnectionError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'channel', cause);
    this.name = 'ConnectionError';
  }
}

export class ProtocolError extends RelayError {
  constructor(message: string) {
    super(message, 'protocol');
    this.name = 'ProtocolError';
  }
}

export class RequestError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'request', cause);
    this.name = 'RequestError';
  }
}

export class ConversionError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'converter', cause);
    this.name = 'ConversionError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'config', cause);
    this.name = 'ConfigError';
  }
}
