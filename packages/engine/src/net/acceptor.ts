import { AcceptError, AcceptorClosedError, SetupError } from "../errors.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";

export interface BindOptions {
  port: number;
  host?: string;
  backlog?: number;
}

type Accepted =
  | { kind: "socket"; socket: ITcpSocket }
  | { kind: "error"; error: AcceptError };

interface Waiter {
  resolve: (socket: ITcpSocket) => void;
  reject: (err: Error) => void;
}

/**
 * Turns the listener's connection callbacks into a pull-based accept().
 *
 * Connections arriving while nobody is waiting are queued in arrival order,
 * so a caller that handles one connection at a time sees them one by one.
 * Listener errors after bind surface as `AcceptError` from the next accept().
 */
export class Acceptor {
  private server: ITcpServer | null = null;
  private ready: Accepted[] = [];
  private waiters: Waiter[] = [];
  private closed = false;
  private boundPort: number | null = null;

  constructor(private readonly socketFactory: ISocketFactory) {}

  get port(): number | null {
    return this.boundPort;
  }

  /** Bind and listen. Rejects with `SetupError` if the listener fails to bind. */
  bind(options: BindOptions): Promise<number> {
    if (this.server) {
      return Promise.reject(new SetupError("Acceptor is already bound"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.server = server;
      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.push({
            kind: "error",
            error: new AcceptError("Could not wrap accepted socket", {
              cause: err,
            }),
          });
          return;
        }
        this.push({ kind: "socket", socket });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.server = null;
          reject(
            new SetupError(
              `Failed to listen on ${options.host ?? "*"}:${options.port}: ${err.message}`,
              { cause: err },
            ),
          );
          return;
        }
        this.push({
          kind: "error",
          error: new AcceptError(`Accept failed: ${err.message}`, {
            cause: err,
          }),
        });
      });

      server.listen(
        { port: options.port, host: options.host, backlog: options.backlog },
        () => {
          if (settled) return;
          settled = true;
          this.boundPort = server.address()?.port ?? options.port;
          resolve(this.boundPort);
        },
      );
    });
  }

  /**
   * Wait for the next connection. Rejects with `AcceptError` on a listener
   * error and with `AcceptorClosedError` once closed.
   */
  accept(): Promise<ITcpSocket> {
    const next = this.ready.shift();
    if (next) {
      return next.kind === "socket"
        ? Promise.resolve(next.socket)
        : Promise.reject(next.error);
    }
    if (this.closed) {
      return Promise.reject(new AcceptorClosedError());
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Stop listening. Queued, not yet accepted connections are closed. */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new AcceptorClosedError());
    }

    for (const item of this.ready) {
      if (item.kind === "socket") {
        item.socket.close();
      }
    }
    this.ready = [];

    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }

  private push(item: Accepted): void {
    if (this.closed) {
      if (item.kind === "socket") {
        item.socket.close();
      }
      return;
    }

    const waiter = this.waiters.shift();
    if (!waiter) {
      this.ready.push(item);
      return;
    }
    if (item.kind === "socket") {
      waiter.resolve(item.socket);
    } else {
      waiter.reject(item.error);
    }
  }
}
