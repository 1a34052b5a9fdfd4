/**
 * Generative API client
 *
 * Typed access to a generative-AI HTTP API, with incremental delivery of
 * streamed completions.
 */

export {
  GenerativeClient,
  type GenerativeClientDelegate,
  type GenerativeClientOptions,
} from "./client/GenerativeClient.js";
export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_MAX_STREAM_BUFFER_SIZE,
  loadConfigFromFile,
  resolveConfiguration,
  type ClientConfiguration,
  type ClientConfigurationInit,
} from "./config.js";
export { V1_API_PATHS, type ApiPaths } from "./constants/endpoints.js";
export {
  APIError,
  ClientError,
  ConfigurationError,
  DecodeError,
  EmptyDataError,
  HTTPStatusError,
  StreamBufferOverflowError,
  StreamCancelledError,
  TransportError,
  type ClientErrorCode,
  type StreamError,
} from "./errors.js";
export { createLogger, logger, type Logger, type LogLevel } from "./logging/index.js";
export { JSONRequest, makeStreamable, MultipartFormDataRequest } from "./requests/RequestBuilder.js";
export { EventDecoder, FrameDecoder, SessionRegistry, StreamingSession, type Frame } from "./stream/index.js";
export { AxiosTransport } from "./transport/index.js";
export * from "./types/results.js";
export type * from "./types/queries.js";
export type * from "./types/stream.js";
export { failure, success, type Result } from "./utils/result.js";
