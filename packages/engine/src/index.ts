// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
} from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export { HeaderMap } from "./http/headers.js";
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
  ReadMore,
} from "./http/request-parser.js";
export {
  emptyRequest,
  HttpRequestParseError,
  parseRequest,
  parseRequestHead,
  readBody,
} from "./http/request-parser.js";
export {
  formatStructured,
  rawStatus,
  sendResponse,
  structured,
} from "./http/response-writer.js";
export type { SocketReaderOptions } from "./http/socket-reader.js";
export { SocketReader } from "./http/socket-reader.js";
export type {
  HttpRequest,
  HttpResponse,
  HttpStatus,
  RawResponse,
  StructuredResponse,
} from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionSessionOptions,
  SessionState,
} from "./server/connection-session.js";
export { ConnectionSession } from "./server/connection-session.js";
export type {
  PathMatcher,
  RouteContext,
  RouteRule,
  RouteTable,
} from "./server/router.js";
export {
  DEFAULT_ROUTES,
  exactPath,
  pathPrefix,
  route,
} from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemoryClient,
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
