/**
 * rpc-cassette
 *
 * Record RPC client calls into cassettes and replay them without a network.
 */

// Cassette file format
export {
  CASSETTE_VERSION,
  CASSETTE_EXTENSION,
  CassetteFileSchema,
  SerializedRequestSchema,
  SerializedResponseSchema,
  JsonValueSchema,
  validateCassetteFile,
  createCassetteFile,
} from "./core/format.js";
export type {
  CassetteFile,
  SerializedRequest,
  SerializedResponse,
  SerializedEntry,
} from "./core/format.js";

// Normalized values, requests and responses
export { encodeValue, decodeValue } from "./core/normalize.js";
export type { JsonValue, JsonObject } from "./core/normalize.js";
export { CallRequest } from "./core/request.js";
export { CallResponse, jsonCodec } from "./core/response.js";
export type { ResultCodec } from "./core/response.js";

// Request matching
export { RequestMatcher, requestsEqual, valuesEqual } from "./core/matcher.js";
export type { RecordingEntry } from "./core/matcher.js";

// Cassettes and storage
export { Cassette } from "./core/cassette.js";
export type { CassetteOptions } from "./core/cassette.js";
export { CassetteStore } from "./store.js";
export type { LoadOptions } from "./store.js";

// Session management
export { SessionManager } from "./core/session.js";
export type { SessionMode } from "./core/session.js";
export { CassetteEngine } from "./engine.js";
export type { SessionOptions } from "./engine.js";
export { CassetteConfig, createConsoleLogger } from "./config.js";
export type { CassetteConfigOptions, CassetteLogger } from "./config.js";

// Transport layer
export { ClientStub } from "./transport/stub.js";
export type {
  ClientStubConfig,
  CallOptions,
  CallHandler,
  Interceptor,
  UnaryCall,
  UnaryTransport,
} from "./transport/stub.js";
export { DeferredOperation, isOperation } from "./transport/operation.js";
export type { Operation, OperationState } from "./transport/operation.js";

// Interceptors
export { RecordingInterceptor } from "./recorder.js";
export type { InterceptorConfig } from "./recorder.js";
export { PlaybackInterceptor } from "./replayer.js";

// Diff
export { CassetteDiff } from "./diff.js";
export type { DiffChange, DiffResult } from "./diff.js";

// Errors
export {
  CassetteError,
  ConfigError,
  RunningError,
  VersionMismatchError,
  NoActiveCassetteError,
  NoRecordingFoundError,
  CassetteNotFoundError,
  CorruptCassetteError,
  CassetteIOError,
  SessionCleanupError,
} from "./errors.js";
