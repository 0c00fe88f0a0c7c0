import {
  type DispatchMode,
  isDispatchMode,
  isRouteTableName,
  parseIntInRange,
  type RouteTableName,
  type ServerConfig,
} from "@cannedhttp/engine";

export interface CliOptions {
  port?: number;
  host?: string;
  dispatch?: DispatchMode;
  maxConcurrency?: number;
  routes?: RouteTableName;
  quiet?: boolean;
}

export type ParseResult =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export function parseArgs(args: string[]): ParseResult {
  const options: CliOptions = {};

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === "--port" || arg === "-p") {
      const port = parseIntInRange(value, 0, 65535);
      if (port === undefined) {
        return { kind: "error", message: `Invalid port number: ${value ?? ""}` };
      }
      options.port = port;
      i++;
    } else if (arg === "--host" || arg === "-H") {
      if (!value) {
        return { kind: "error", message: "--host needs a value" };
      }
      options.host = value;
      i++;
    } else if (arg === "--dispatch" || arg === "-d") {
      if (value === undefined || !isDispatchMode(value)) {
        return {
          kind: "error",
          message: `Invalid dispatch mode: ${value ?? ""} (expected sequential or concurrent)`,
        };
      }
      options.dispatch = value;
      i++;
    } else if (arg === "--max-concurrency") {
      const limit = parseIntInRange(value, 1, 65535);
      if (limit === undefined) {
        return { kind: "error", message: `Invalid concurrency: ${value ?? ""}` };
      }
      options.maxConcurrency = limit;
      i++;
    } else if (arg === "--routes") {
      if (value === undefined || !isRouteTableName(value)) {
        return {
          kind: "error",
          message: `Unknown route table: ${value ?? ""} (expected plain or json)`,
        };
      }
      options.routes = value;
      i++;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "run", options };
}

/** Layer command-line options over a config built from the environment. */
export function applyOptions(
  config: ServerConfig,
  options: CliOptions,
): ServerConfig {
  return {
    ...config,
    port: options.port ?? config.port,
    host: options.host ?? config.host,
    dispatch: options.dispatch ?? config.dispatch,
    maxConcurrency: options.maxConcurrency ?? config.maxConcurrency,
    routes: options.routes ?? config.routes,
    quiet: options.quiet ?? config.quiet,
  };
}

export const HELP_TEXT = `
cannedhttp - answer HTTP probes with canned responses

Usage: cannedhttp [options]

Options:
  --port, -p <port>          Port to listen on (default: $PORT or 8080)
  --host, -H <host>          Host to bind (default: $HOST or 0.0.0.0)
  --dispatch, -d <mode>      sequential or concurrent (default: $DISPATCH or sequential)
  --max-concurrency <n>      Connections handled at once in concurrent mode (default: 64)
  --routes <table>           plain or json (default: $ROUTES or plain)
  --quiet, -q                Suppress request logging
  --version, -v              Show version
  --help, -h                 Show this help
`;
