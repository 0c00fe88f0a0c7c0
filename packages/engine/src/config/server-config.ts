import { DEFAULT_READ_BUFFER_SIZE } from "../http/request-reader.js";
import { isRouteTableName, type RouteTableName } from "../http/router.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

export type DispatchMode = "sequential" | "concurrent";

/** What to do with a connection whose first read returns zero bytes. */
export type EmptyRequestPolicy = "not-found" | "close";

export interface ServerConfig {
  /** Port to listen on. 0 picks an ephemeral port. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** listen(2) backlog. Default: 16 */
  backlog: number;
  /** How accepted connections are handed to the handler. Default: 'sequential' */
  dispatch: DispatchMode;
  /** Handlers running at once in concurrent mode. Default: 64 */
  maxConcurrency: number;
  /** Connections queued behind a full pool before new ones are dropped. Default: 1024 */
  maxPendingConnections: number;
  /** Bytes taken from the single request read. Default: 1024 */
  readBufferSize: number;
  /** 0 disables the read timeout. Default: 0 */
  readTimeoutMs: number;
  /** Default: 'not-found' */
  emptyRequest: EmptyRequestPolicy;
  /** Built-in route table to serve. Default: 'plain' */
  routes: RouteTableName;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Default: 'info' */
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 8080;

export type Env = Record<string, string | undefined>;

export function defaultConfig(): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    backlog: 16,
    dispatch: "sequential",
    maxConcurrency: 64,
    maxPendingConnections: 1024,
    readBufferSize: DEFAULT_READ_BUFFER_SIZE,
    readTimeoutMs: 0,
    emptyRequest: "not-found",
    routes: "plain",
    quiet: false,
    logLevel: "info",
  };
}

/**
 * Parse a strictly decimal integer within [min, max]. Anything else
 * (empty, signs, fractions, trailing characters, out of range) is undefined.
 */
export function parseIntInRange(
  value: string | undefined,
  min: number,
  max: number,
): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min || parsed > max) return undefined;
  return parsed;
}

export function parsePort(value: string | undefined): number | undefined {
  return parseIntInRange(value, 1, 65535);
}

export function isDispatchMode(value: string): value is DispatchMode {
  return value === "sequential" || value === "concurrent";
}

export function isEmptyRequestPolicy(
  value: string,
): value is EmptyRequestPolicy {
  return value === "not-found" || value === "close";
}

/** Port from `PORT`, or 8080 when it is absent or not a valid port. */
export function resolvePort(env: Env = process.env): number {
  return parsePort(env.PORT) ?? DEFAULT_PORT;
}

function pick<T extends string>(
  value: string | undefined,
  guard: (candidate: string) => candidate is T,
  fallback: T,
): T {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return guard(normalized) ? normalized : fallback;
}

/**
 * Build the server config from environment variables. Each invalid value
 * falls back to its default independently.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const defaults = defaultConfig();
  const host = env.HOST?.trim();

  return {
    ...defaults,
    port: resolvePort(env),
    host: host ? host : defaults.host,
    dispatch: pick(env.DISPATCH, isDispatchMode, defaults.dispatch),
    maxConcurrency:
      parseIntInRange(env.MAX_CONCURRENCY, 1, 65535) ?? defaults.maxConcurrency,
    maxPendingConnections:
      parseIntInRange(env.MAX_PENDING, 0, 1_000_000) ??
      defaults.maxPendingConnections,
    routes: pick(env.ROUTES, isRouteTableName, defaults.routes),
    emptyRequest: pick(
      env.EMPTY_REQUEST,
      isEmptyRequestPolicy,
      defaults.emptyRequest,
    ),
    logLevel: pick(env.LOG_LEVEL, isLogLevel, defaults.logLevel),
  };
}
