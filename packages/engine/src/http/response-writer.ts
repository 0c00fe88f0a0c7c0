import { WriteError, toError } from "../errors.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { Route } from "./router.js";
import { type HttpResponse, statusText } from "./types.js";

export function buildResponse(route: Route): HttpResponse {
  return textResponse(route.status, route.contentType, route.body);
}

export function textResponse(
  status: number,
  contentType: string,
  body: string,
): HttpResponse {
  return {
    status,
    statusText: statusText(status),
    headers: new Map([["Content-Type", contentType]]),
    body: fromString(body),
  };
}

/**
 * Serialize a response: status line, headers in insertion order, blank line,
 * body. Content-Length is always the body's byte length; Connection is
 * `close` unless the caller set it.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const headers = new Map(response.headers);
  headers.set("Content-Length", String(response.body.length));
  if (!headers.has("Connection")) {
    headers.set("Connection", "close");
  }

  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${response.statusText}`,
  ];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

/**
 * Send a complete response in one write. A failed send rejects with
 * `WriteError`; nothing is retried.
 */
export async function writeResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  try {
    if (socket.sendAndWait) {
      await socket.sendAndWait(bytes);
    } else {
      socket.send(bytes);
    }
  } catch (err) {
    const cause = toError(err);
    throw new WriteError(`Write failed: ${cause.message}`, { cause });
  }
}
