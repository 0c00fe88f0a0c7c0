import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpListenOptions,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  private socket: net.Socket;
  private _lastError?: Error;
  private _ended = false;

  constructor(socket: net.Socket) {
    this.socket = socket;
    // Registered up front: a socket can fail or see the peer's FIN while it
    // sits in the accept queue.
    this.socket.on("error", (err) => {
      this._lastError = err;
    });
    this.socket.on("end", () => {
      this._ended = true;
    });
  }

  get closed(): boolean {
    return this.socket.destroyed;
  }

  get ended(): boolean {
    return this._ended;
  }

  get lastError(): Error | undefined {
    return this._lastError;
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      // The write callback fires once the chunk is flushed to the kernel.
      this.socket.write(data, (err) => {
        if (err) {
          fail(err);
        } else {
          done();
        }
      });
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onEnd(cb: () => void): void {
    this.socket.on("end", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    if (this.socket.destroyed) {
      return;
    }
    if (!this.socket.writable) {
      this.socket.destroy();
      return;
    }
    // end() flushes queued writes before the FIN; destroy releases the fd
    // even if the peer never reads.
    this.socket.end(() => this.socket.destroy());
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server;

  constructor() {
    // Node sets SO_REUSEADDR on every TCP listener it binds. allowHalfOpen
    // keeps the write side open after the client's FIN.
    this.server = net.createServer({ allowHalfOpen: true });
  }

  listen(options: TcpListenOptions, callback?: () => void): void {
    this.server.listen(
      { port: options.port, host: options.host, backlog: options.backlog },
      callback,
    );
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    this.server.on(event, cb);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
