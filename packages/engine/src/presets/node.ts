import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Router } from "../http/router.js";
import type { Logger } from "../logging/logger.js";
import { CannedServer } from "../server/canned-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
  router?: Router;
}

export function createNodeServer(options: NodeServerOptions): CannedServer {
  return new CannedServer({
    socketFactory: new NodeSocketFactory(),
    config: options.config,
    logger: options.logger,
    router: options.router,
  });
}
