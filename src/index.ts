/**
 * STL Relay: library surface, for embedding the channel with another converter.
 */

export { ChannelServer, type ChannelRequest } from './channel/server.js';
export { ChannelConnection } from './channel/connection.js';
export { ShutdownContext, type CleanupAction } from './channel/shutdown.js';
export { installProcessHooks } from './channel/lifecycle.js';
export { writeResponse, formatResponse } from './channel/response.js';
export { encodeTransmission, parseResponses, submitRequests, type SubmitOptions } from './channel/client.js';
export { LineFramer } from './channel/line-framer.js';
export { RequestAssembler, type AssemblerEvent } from './channel/request-assembler.js';
export { RequestReader } from './channel/request-reader.js';
export * from './channel/protocol.js';

export type { Converter } from './converter/types.js';
export { CommandConverter } from './converter/command-converter.js';
export { parseConversionRequest, CONVERSION_DEFAULTS } from './converter/request.js';
export { parseDataUri } from './converter/data-uri.js';

export { runRelay, handleRequest } from './relay/dispatcher.js';
export { startRelay } from './relay/service.js';

export { loadConfig, toChannelConfig } from './shared/config.js';
export * from './shared/errors.js';
export type { ChannelConfig, ConversionRequest, RelayConfig } from './shared/types.js';
export { DEFAULT_CONFIG } from './shared/types.js';
