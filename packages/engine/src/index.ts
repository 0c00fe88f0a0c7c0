// Node adapter
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export {
  DEFAULT_PORT,
  type DispatchMode,
  type EmptyRequestPolicy,
  type Env,
  defaultConfig,
  isDispatchMode,
  isEmptyRequestPolicy,
  loadConfig,
  parseIntInRange,
  parsePort,
  resolvePort,
  type ServerConfig,
} from "./config/server-config.js";
// Errors
export {
  AcceptError,
  AcceptorClosedError,
  ReadError,
  ServerError,
  type ServerErrorCode,
  SetupError,
  WriteError,
} from "./errors.js";
// HTTP
export {
  DEFAULT_READ_BUFFER_SIZE,
  parseRawRequest,
  pathOf,
  type ReadRequestOptions,
  readRawRequest,
  readRequest,
  tokenizeRequestLine,
} from "./http/request-reader.js";
export {
  buildResponse,
  serializeResponse,
  textResponse,
  writeResponse,
} from "./http/response-writer.js";
export {
  isRouteTableName,
  JSON_ROUTES,
  PLAIN_ROUTES,
  ROUTE_TABLES,
  type Route,
  type RouteTable,
  type RouteTableName,
  Router,
} from "./http/router.js";
export type {
  HttpRequest,
  HttpRequestLine,
  HttpResponse,
} from "./http/types.js";
export { STATUS_TEXT, statusText } from "./http/types.js";
// Interfaces
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpListenOptions,
} from "./interfaces/socket.js";
// Logging
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogEntry,
  type Logger,
  type LogLevel,
  LogStore,
  prefixedLogger,
  silentLogger,
  storeLogger,
} from "./logging/logger.js";
// Networking
export { Acceptor, type BindOptions } from "./net/acceptor.js";
// Presets
export { createNodeServer, type NodeServerOptions } from "./presets/node.js";
// Server
export {
  CannedServer,
  type CannedServerEvents,
  type CannedServerOptions,
  type ServerState,
} from "./server/canned-server.js";
export {
  ConnectionHandler,
  type ConnectionHandlerOptions,
} from "./server/connection-handler.js";
export {
  ConcurrentDispatch,
  type ConnectionTask,
  createDispatchStrategy,
  type DispatchStrategy,
  SequentialDispatch,
} from "./server/dispatch.js";
// Testing
export {
  type InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { WorkerPool, type WorkerPoolOptions } from "./utils/worker-pool.js";
