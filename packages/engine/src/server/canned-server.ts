import type { ServerConfig } from "../config/server-config.js";
import { AcceptError, AcceptorClosedError, toError } from "../errors.js";
import { ROUTE_TABLES, Router } from "../http/router.js";
import type { ISocketFactory, ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { Acceptor } from "../net/acceptor.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { ConnectionHandler } from "./connection-handler.js";
import { createDispatchStrategy, type DispatchStrategy } from "./dispatch.js";

export interface CannedServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  logger?: Logger;
  /** Overrides the built-in table named by `config.routes`. */
  router?: Router;
}

export type ServerState = "idle" | "accepting" | "dispatching" | "stopped";

export type CannedServerEvents = {
  listening: [port: number];
  "accept-error": [err: AcceptError];
  "connection-error": [err: Error];
  response: [path: string, status: number];
  close: [];
};

export class CannedServer extends EventEmitter<CannedServerEvents> {
  private readonly socketFactory: ISocketFactory;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly handler: ConnectionHandler;
  private readonly dispatcher: DispatchStrategy;
  private acceptor: Acceptor | null = null;
  private loop: Promise<void> | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();
  private _state: ServerState = "idle";

  constructor(options: CannedServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.handler = new ConnectionHandler({
      router: options.router ?? new Router(ROUTE_TABLES[this.config.routes]),
      logger: this.logger,
      readBufferSize: this.config.readBufferSize,
      readTimeoutMs: this.config.readTimeoutMs,
      emptyRequest: this.config.emptyRequest,
      quiet: this.config.quiet,
      onResponse: (path, status) => this.emit("response", path, status),
      onError: (err) => this.emit("connection-error", err),
    });

    this.dispatcher = createDispatchStrategy(this.config.dispatch, {
      maxConcurrency: this.config.maxConcurrency,
      maxPending: this.config.maxPendingConnections,
      logger: this.logger,
    });
  }

  get state(): ServerState {
    return this._state;
  }

  get dispatchMode(): DispatchStrategy["mode"] {
    return this.dispatcher.mode;
  }

  /**
   * Bind, announce the port, and start the accept loop in the background.
   * Rejects with `SetupError` when the listener cannot bind.
   */
  async start(): Promise<number> {
    if (this.acceptor) {
      throw new Error("Server is already started");
    }
    if (this.isStopped()) {
      throw new Error("Server has been stopped");
    }

    const acceptor = new Acceptor(this.socketFactory);
    this.acceptor = acceptor;

    let port: number;
    try {
      port = await acceptor.bind({
        port: this.config.port,
        host: this.config.host,
        backlog: this.config.backlog,
      });
    } catch (err) {
      this.acceptor = null;
      throw err;
    }

    this.logger.info(`Server listening on port ${port}`);
    this.emit("listening", port);
    this.loop = this.acceptLoop(acceptor);
    return port;
  }

  /**
   * Stop accepting, close the listener, and close every live connection,
   * including those still waiting for a worker. In-flight handlers are
   * abandoned, not awaited.
   */
  async stop(): Promise<void> {
    const acceptor = this.acceptor;
    const loop = this.loop;
    this.acceptor = null;
    this.loop = null;
    this._state = "stopped";

    this.dispatcher.clear();
    for (const socket of [...this.activeConnections]) {
      socket.close();
    }
    this.activeConnections.clear();

    if (acceptor) {
      await acceptor.close();
    }
    await loop;
    this.emit("close");
  }

  /** Resolves once every dispatched connection has been handled. */
  drain(): Promise<void> {
    return this.dispatcher.drain();
  }

  private async acceptLoop(acceptor: Acceptor): Promise<void> {
    while (!this.isStopped()) {
      this._state = "accepting";

      let socket: ITcpSocket;
      try {
        socket = await acceptor.accept();
      } catch (err) {
        if (err instanceof AcceptorClosedError) {
          break;
        }
        const acceptError =
          err instanceof AcceptError
            ? err
            : new AcceptError(toError(err).message, { cause: err });
        this.logger.warn(`${acceptError.message}; still accepting`);
        this.emit("accept-error", acceptError);
        continue;
      }

      if (this.isStopped()) {
        socket.close();
        break;
      }

      this._state = "dispatching";
      this.track(socket);
      await this.dispatcher.dispatch(socket, (conn) => this.handler.handle(conn));
    }

    this._state = "stopped";
  }

  private isStopped(): boolean {
    return this._state === "stopped";
  }

  /** Live from dispatch until close, whether handled, queued or dropped. */
  private track(socket: ITcpSocket): void {
    if (socket.closed) return;
    this.activeConnections.add(socket);
    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });
  }
}
