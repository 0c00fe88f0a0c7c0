import { ReadError } from "../errors.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import type { HttpRequest, HttpRequestLine } from "./types.js";

const CRLF = new Uint8Array([13, 10]); // \r\n
export const DEFAULT_READ_BUFFER_SIZE = 1024;

export interface ReadRequestOptions {
  /** Upper bound on the bytes taken from the single read. Default: 1024 */
  bufferSize?: number;
  /** 0 waits forever. Default: 0 */
  timeoutMs?: number;
}

function findSequence(buffer: Uint8Array, sequence: Uint8Array): number {
  outer: for (let i = 0; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Perform one bounded read from the socket.
 *
 * Resolves with the first chunk delivered (truncated to `bufferSize`), or an
 * empty array if the peer ends or closes before sending anything. Rejects with
 * `ReadError` if the socket errors first.
 */
export function readRawRequest(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<Uint8Array> {
  const bufferSize = options?.bufferSize ?? DEFAULT_READ_BUFFER_SIZE;
  const timeoutMs = options?.timeoutMs ?? 0;

  if (socket.lastError) {
    const err = socket.lastError;
    return Promise.reject(
      new ReadError("READ_FAILED", `Read failed: ${err.message}`, {
        cause: err,
      }),
    );
  }
  return new Promise((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (finish: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      finish();
    };

    socket.onData((data) => {
      settle(() => resolve(data.slice(0, bufferSize)));
    });

    socket.onEnd(() => {
      settle(() => resolve(new Uint8Array(0)));
    });

    socket.onClose(() => {
      settle(() => resolve(new Uint8Array(0)));
    });

    socket.onError((err) => {
      settle(() =>
        reject(
          new ReadError("READ_FAILED", `Read failed: ${err.message}`, {
            cause: err,
          }),
        ),
      );
    });

    // The peer may have finished before we started listening.
    if (socket.closed || socket.ended) {
      settle(() => resolve(new Uint8Array(0)));
      return;
    }

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        settle(() =>
          reject(
            new ReadError(
              "READ_TIMEOUT",
              `No data received within ${timeoutMs}ms`,
            ),
          ),
        );
      }, timeoutMs);
    }
  });
}

/**
 * Split the first line of a raw request into method, target and version.
 * A method and an origin-form target ("/...") are enough; the version is
 * empty when the third token is missing or is not `HTTP/x`. Returns null
 * when there is no target.
 */
export function tokenizeRequestLine(raw: Uint8Array): HttpRequestLine | null {
  const lineEnd = findSequence(raw, CRLF);
  const line = decodeToString(lineEnd === -1 ? raw : raw.subarray(0, lineEnd));
  const [method, target, rawVersion] = line.trim().split(/\s+/);
  if (!method || !target?.startsWith("/")) {
    return null;
  }

  return {
    method,
    target,
    httpVersion: rawVersion?.startsWith("HTTP/")
      ? rawVersion.slice("HTTP/".length)
      : "",
  };
}

export function pathOf(target: string): string {
  const queryStart = target.indexOf("?");
  return queryStart === -1 ? target : target.slice(0, queryStart);
}

/**
 * Build a request from raw bytes. Zero bytes give an empty request (empty
 * method and target); bytes that do not tokenize give null.
 */
export function parseRawRequest(raw: Uint8Array): HttpRequest | null {
  if (raw.length === 0) {
    return { method: "", target: "", httpVersion: "", path: "", raw };
  }

  const line = tokenizeRequestLine(raw);
  if (!line) {
    return null;
  }
  return { ...line, path: pathOf(line.target), raw };
}

/** Read once from the socket and parse what arrived. */
export async function readRequest(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<HttpRequest | null> {
  const raw = await readRawRequest(socket, options);
  return parseRawRequest(raw);
}
