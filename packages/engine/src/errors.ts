export type ServerErrorCode =
  | "BIND_FAILED"
  | "ACCEPT_FAILED"
  | "ACCEPTOR_CLOSED"
  | "READ_FAILED"
  | "READ_TIMEOUT"
  | "WRITE_FAILED";

export class ServerError extends Error {
  constructor(
    readonly code: ServerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ServerError";
  }
}

/** Socket creation, bind or listen failed. Fatal. */
export class SetupError extends ServerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BIND_FAILED", message, options);
    this.name = "SetupError";
  }
}

/** The listener reported an error after it was bound. */
export class AcceptError extends ServerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ACCEPT_FAILED", message, options);
    this.name = "AcceptError";
  }
}

export class AcceptorClosedError extends ServerError {
  constructor() {
    super("ACCEPTOR_CLOSED", "Acceptor is closed");
    this.name = "AcceptorClosedError";
  }
}

export class ReadError extends ServerError {
  constructor(
    code: "READ_FAILED" | "READ_TIMEOUT",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "ReadError";
  }
}

export class WriteError extends ServerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WRITE_FAILED", message, options);
    this.name = "WriteError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
