import type { EmptyRequestPolicy } from "../config/server-config.js";
import { ReadError, WriteError } from "../errors.js";
import { readRequest } from "../http/request-reader.js";
import {
  buildResponse,
  textResponse,
  writeResponse,
} from "../http/response-writer.js";
import type { Router } from "../http/router.js";
import type { HttpResponse } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";

export interface ConnectionHandlerOptions {
  router: Router;
  logger: Logger;
  readBufferSize: number;
  readTimeoutMs: number;
  emptyRequest: EmptyRequestPolicy;
  quiet: boolean;
  /** Called after a response has been written. */
  onResponse?: (path: string, status: number) => void;
  /** Called for read and write failures. */
  onError?: (err: Error) => void;
}

/**
 * One request, one response, then close. `handle` never rejects; the socket
 * is closed on every path out.
 */
export class ConnectionHandler {
  constructor(private readonly options: ConnectionHandlerOptions) {}

  async handle(socket: ITcpSocket): Promise<void> {
    const { logger } = this.options;
    try {
      await this.serve(socket);
    } catch (err) {
      if (err instanceof ReadError || err instanceof WriteError) {
        logger.warn(`${err.message} (${socket.remoteAddress ?? "?"})`);
        this.options.onError?.(err);
      } else {
        logger.error("Unexpected connection failure:", err);
      }
    } finally {
      socket.close();
    }
  }

  private async serve(socket: ITcpSocket): Promise<void> {
    const request = await readRequest(socket, {
      bufferSize: this.options.readBufferSize,
      timeoutMs: this.options.readTimeoutMs,
    });

    if (!request) {
      await this.respond(
        socket,
        "",
        textResponse(400, "text/plain", "Bad Request"),
        "malformed request line",
      );
      return;
    }

    if (request.raw.length === 0 && this.options.emptyRequest === "close") {
      this.options.logger.debug(
        `Empty request from ${socket.remoteAddress ?? "?"}, closing`,
      );
      return;
    }

    const route = this.options.router.route(request.path);
    await this.respond(
      socket,
      request.path,
      buildResponse(route),
      `${request.method || "-"} ${request.target || "-"}`,
    );
  }

  private async respond(
    socket: ITcpSocket,
    path: string,
    response: HttpResponse,
    description: string,
  ): Promise<void> {
    await writeResponse(socket, response);

    if (!this.options.quiet) {
      this.options.logger.info(
        `${description} ${response.status} - ${socket.remoteAddress ?? "?"}`,
      );
    }
    this.options.onResponse?.(path, response.status);
  }
}
