/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the server engine from the runtime that owns the
 * sockets (Node's `net`, or the in-memory pair used by tests).
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve once the runtime has handed it to the OS.
   * Rejects when the write fails or the socket closes first.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for the peer finishing its side (FIN). */
  onEnd(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Flush pending output and close the connection. Idempotent. */
  close(): void;

  /** True once the connection has closed, from either side. */
  readonly closed: boolean;

  /** True once the peer has finished sending. The socket may still be written. */
  readonly ended: boolean;

  /** The last error the socket reported, if any. */
  readonly lastError?: Error;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface TcpListenOptions {
  port: number;
  host?: string;
  /** Pending-connection queue length handed to listen(2). */
  backlog?: number;
}

export interface ITcpServer {
  /** Start listening. The callback fires once the socket is bound. */
  listen(options: TcpListenOptions, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors (bind failures and accept failures). */
  on(event: "error", cb: (err: Error) => void): void;

  /** Close the server. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
