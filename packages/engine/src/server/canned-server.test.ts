import { describe, expect, it } from "vitest";
import { defaultConfig, type ServerConfig } from "../config/server-config.js";
import { SetupError } from "../errors.js";
import { JSON_ROUTES, Router } from "../http/router.js";
import { LogStore, storeLogger } from "../logging/logger.js";
import { InMemorySocketFactory } from "../testing/in-memory-socket-factory.js";
import { decodeToString } from "../utils/buffer.js";
import { CannedServer } from "./canned-server.js";

interface ParsedResponse {
  statusLine: string;
  status: number;
  headers: Map<string, string>;
  body: string;
}

function parseResponse(raw: Uint8Array): ParsedResponse {
  const text = decodeToString(raw);
  const splitAt = text.indexOf("\r\n\r\n");
  if (splitAt === -1) {
    throw new Error(`Invalid HTTP response: ${JSON.stringify(text)}`);
  }

  const lines = text.slice(0, splitAt).split("\r\n");
  const statusLine = lines[0];
  const status = Number.parseInt(statusLine.split(" ")[1] ?? "", 10);

  const headers = new Map<string, string>();
  for (let i = 1; i < lines.length; i++) {
    const colon = lines[i].indexOf(":");
    if (colon === -1) continue;
    const key = lines[i].slice(0, colon).trim().toLowerCase();
    headers.set(key, lines[i].slice(colon + 1).trim());
  }

  return { statusLine, status, headers, body: text.slice(splitAt + 4) };
}

function tick(ms = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface Harness {
  server: CannedServer;
  socketFactory: InMemorySocketFactory;
  logs: LogStore;
  responses: Array<[path: string, status: number]>;
  request: (rawHttp: string) => Promise<ParsedResponse>;
}

async function withServer(
  configOverrides: Partial<ServerConfig>,
  testBody: (ctx: Harness) => Promise<void>,
  router?: Router,
): Promise<void> {
  const socketFactory = new InMemorySocketFactory();
  const logs = new LogStore();
  const server = new CannedServer({
    socketFactory,
    config: { ...defaultConfig(), port: 0, ...configOverrides },
    logger: storeLogger(logs),
    router,
  });
  const responses: Array<[string, number]> = [];
  server.on("response", (path, status) => responses.push([path, status]));

  await server.start();
  try {
    await testBody({
      server,
      socketFactory,
      logs,
      responses,
      request: async (rawHttp) =>
        parseResponse(await socketFactory.request(rawHttp)),
    });
  } finally {
    await server.stop();
  }
}

describe.each(["sequential", "concurrent"] as const)(
  "CannedServer (%s dispatch)",
  (dispatch) => {
    it("answers GET /health with 200 OK", async () => {
      await withServer({ dispatch }, async ({ request }) => {
        const res = await request("GET /health HTTP/1.1\r\n\r\n");

        expect(res.statusLine).toBe("HTTP/1.1 200 OK");
        expect(res.headers.get("content-type")).toBe("text/plain");
        expect(res.headers.get("content-length")).toBe("2");
        expect(res.body).toBe("OK");
      });
    });

    it("answers unknown paths with 404 Not Found", async () => {
      await withServer({ dispatch }, async ({ request }) => {
        const res = await request("GET /missing HTTP/1.1\r\n\r\n");

        expect(res.statusLine).toBe("HTTP/1.1 404 Not Found");
        expect(res.headers.get("content-length")).toBe("9");
        expect(res.body).toBe("Not Found");
      });
    });

    it("closes the connection after one response", async () => {
      await withServer({ dispatch }, async ({ socketFactory }) => {
        const client = socketFactory.connect();
        client.send(
          "GET /health HTTP/1.1\r\n\r\nGET /health HTTP/1.1\r\n\r\n",
        );
        const raw = decodeToString(await client.response);

        expect(client.closed).toBe(true);
        expect(raw.split("HTTP/1.1 200 OK")).toHaveLength(2);
      });
    });

    it("keeps serving after a simulated accept failure", async () => {
      await withServer({ dispatch }, async ({ server, socketFactory, logs, request }) => {
        const acceptErrors: string[] = [];
        server.on("accept-error", (err) => acceptErrors.push(err.message));

        socketFactory.injectAcceptError(new Error("accept EMFILE"));
        await tick();

        const res = await request("GET /health HTTP/1.1\r\n\r\n");
        expect(res.status).toBe(200);
        expect(res.body).toBe("OK");
        expect(acceptErrors).toEqual(["Accept failed: accept EMFILE"]);
        expect(logs.messages("warn")).toContain(
          "Accept failed: accept EMFILE; still accepting",
        );
      });
    });

    it("keeps serving after a connection it cannot wrap", async () => {
      await withServer({ dispatch }, async ({ socketFactory, request }) => {
        socketFactory.injectForeignConnection();
        await tick();

        const res = await request("GET /health HTTP/1.1\r\n\r\n");
        expect(res.status).toBe(200);
      });
    });

    it("gives every concurrent client its own response", async () => {
      await withServer({ dispatch, routes: "json" }, async ({ socketFactory }) => {
        const targets = ["/", "/health", "/users", "/nope", "/health", "/"];
        const results = await Promise.all(
          targets.map((target) =>
            socketFactory.request(`GET ${target} HTTP/1.1\r\n\r\n`),
          ),
        );
        const router = new Router(JSON_ROUTES);

        results.forEach((raw, i) => {
          const res = parseResponse(raw);
          const expected = router.route(targets[i]);
          expect(res.status).toBe(expected.status);
          expect(res.body).toBe(expected.body);
          expect(res.headers.get("content-type")).toBe("application/json");
          expect(Number(res.headers.get("content-length"))).toBe(
            new TextEncoder().encode(expected.body).length,
          );
        });
      });
    });
  },
);

describe("CannedServer request handling", () => {
  it("ignores the query string when routing", async () => {
    await withServer({}, async ({ request }) => {
      const res = await request("GET /health?probe=1 HTTP/1.1\r\nHost: x\r\n\r\n");
      expect(res.status).toBe(200);
    });
  });

  it("routes on the path whatever the method", async () => {
    await withServer({}, async ({ request }) => {
      const res = await request("POST /health HTTP/1.1\r\nContent-Length: 0\r\n\r\n");
      expect(res.status).toBe(200);
    });
  });

  it("answers a malformed request line with 400", async () => {
    await withServer({}, async ({ request }) => {
      const res = await request("hello there\r\n\r\n");
      expect(res.statusLine).toBe("HTTP/1.1 400 Bad Request");
      expect(res.body).toBe("Bad Request");
    });
  });

  it("answers a request line without a version", async () => {
    await withServer({}, async ({ request }) => {
      const res = await request("GET /health\r\n\r\n");
      expect(res.statusLine).toBe("HTTP/1.1 200 OK");
      expect(res.body).toBe("OK");
    });
  });

  it("answers a zero-byte request with not found after the client's FIN", async () => {
    await withServer({}, async ({ socketFactory, responses }) => {
      const client = socketFactory.connect();
      client.end();
      const raw = decodeToString(await client.response);

      expect(raw).toBe(
        "HTTP/1.1 404 Not Found\r\n" +
          "Content-Type: text/plain\r\n" +
          "Content-Length: 9\r\n" +
          "Connection: close\r\n" +
          "\r\n" +
          "Not Found",
      );
      expect(responses).toEqual([["", 404]]);
    });
  });

  it("closes silently on a zero-byte request when configured to", async () => {
    await withServer({ emptyRequest: "close" }, async ({ socketFactory, responses, logs }) => {
      const client = socketFactory.connect();
      client.end();
      const raw = await client.response;

      expect(raw.length).toBe(0);
      expect(responses).toEqual([]);
      expect(logs.messages("debug")).toEqual([
        "Empty request from in-memory, closing",
      ]);
    });
  });

  it("reports a write failure when the client has already gone", async () => {
    await withServer({}, async ({ server, socketFactory, responses, logs }) => {
      const errors: string[] = [];
      server.on("connection-error", (err) => errors.push(err.message));

      const client = socketFactory.connect();
      client.close();
      await tick();

      expect(errors).toEqual(["Write failed: Socket is not writable"]);
      expect(logs.messages("warn")).toEqual([
        "Write failed: Socket is not writable (in-memory)",
      ]);
      expect(responses).toEqual([]);
    });
  });

  it("closes the connection without a response when the read fails", async () => {
    await withServer({}, async ({ server, socketFactory, responses, request }) => {
      const errors: string[] = [];
      server.on("connection-error", (err) => errors.push(err.message));

      const client = socketFactory.connect();
      client.failServerSide(new Error("ECONNRESET"));
      const raw = await client.response;
      await tick();

      expect(raw.length).toBe(0);
      expect(errors).toEqual(["Read failed: ECONNRESET"]);
      expect(responses).toEqual([]);

      const res = await request("GET /health HTTP/1.1\r\n\r\n");
      expect(res.status).toBe(200);
    });
  });

  it("serves a custom router", async () => {
    const router = new Router({
      routes: [
        { pattern: "/ping", status: 200, contentType: "text/plain", body: "pong" },
      ],
      notFound: { pattern: "*", status: 404, contentType: "text/plain", body: "no" },
    });
    await withServer(
      {},
      async ({ request }) => {
        expect((await request("GET /ping HTTP/1.1\r\n\r\n")).body).toBe("pong");
        expect((await request("GET /health HTTP/1.1\r\n\r\n")).body).toBe("no");
      },
      router,
    );
  });

  it("logs each request unless quiet", async () => {
    await withServer({}, async ({ request, logs }) => {
      await request("GET /health HTTP/1.1\r\n\r\n");
      await tick();
      expect(logs.messages("info")).toContain("GET /health 200 - in-memory");
    });

    await withServer({ quiet: true }, async ({ request, logs }) => {
      await request("GET /health HTTP/1.1\r\n\r\n");
      await tick();
      expect(logs.messages("info")).toEqual(["Server listening on port 41000"]);
    });
  });
});

describe("CannedServer dispatch strategies", () => {
  it("sequential: a slow client holds up the next one", async () => {
    await withServer({ dispatch: "sequential" }, async ({ socketFactory, responses, server }) => {
      const slow = socketFactory.connect();
      const fast = socketFactory.connect();
      fast.send("GET /health HTTP/1.1\r\n\r\n");
      await tick();

      expect(responses).toEqual([]);
      expect(fast.closed).toBe(false);
      expect(server.state).toBe("dispatching");

      slow.send("GET /missing HTTP/1.1\r\n\r\n");
      await Promise.all([slow.response, fast.response]);
      await tick();

      expect(responses).toEqual([
        ["/missing", 404],
        ["/health", 200],
      ]);
      expect(server.state).toBe("accepting");
    });
  });

  it("concurrent: a slow client does not hold up the next one", async () => {
    await withServer({ dispatch: "concurrent" }, async ({ socketFactory, responses, server }) => {
      const slow = socketFactory.connect();
      const fast = socketFactory.connect();
      fast.send("GET /health HTTP/1.1\r\n\r\n");

      const res = parseResponse(await fast.response);
      await tick();
      expect(res.status).toBe(200);
      expect(slow.closed).toBe(false);
      expect(server.state).toBe("accepting");

      slow.send("GET /missing HTTP/1.1\r\n\r\n");
      await slow.response;
      await server.drain();

      expect(responses).toEqual([
        ["/health", 200],
        ["/missing", 404],
      ]);
    });
  });

  it("concurrent: the pool cap queues work beyond maxConcurrency", async () => {
    await withServer(
      { dispatch: "concurrent", maxConcurrency: 1 },
      async ({ socketFactory, responses }) => {
        const slow = socketFactory.connect();
        const fast = socketFactory.connect();
        fast.send("GET /health HTTP/1.1\r\n\r\n");
        await tick();

        expect(responses).toEqual([]);

        slow.send("GET /missing HTTP/1.1\r\n\r\n");
        await Promise.all([slow.response, fast.response]);
        await tick();
        expect(responses.map(([path]) => path)).toEqual(["/missing", "/health"]);
      },
    );
  });

  it("concurrent: drops connections once the queue is full", async () => {
    await withServer(
      { dispatch: "concurrent", maxConcurrency: 1, maxPendingConnections: 0 },
      async ({ socketFactory, logs }) => {
        const slow = socketFactory.connect();
        await tick();
        const dropped = socketFactory.connect();

        const raw = await dropped.response;
        expect(raw.length).toBe(0);
        expect(logs.messages("warn")).toEqual([
          "Worker queue full (0 waiting), dropping connection from in-memory",
        ]);

        slow.send("GET /health HTTP/1.1\r\n\r\n");
        expect(parseResponse(await slow.response).status).toBe(200);
      },
    );
  });
});

describe("CannedServer lifecycle", () => {
  it("announces the port it listens on", async () => {
    await withServer({ port: 8080 }, async ({ logs }) => {
      expect(logs.messages("info")).toEqual(["Server listening on port 8080"]);
    });
  });

  it("rejects start with SetupError when the port cannot be bound", async () => {
    const server = new CannedServer({
      socketFactory: new InMemorySocketFactory({
        bindError: new Error("listen EACCES"),
      }),
      config: { ...defaultConfig(), port: 80 },
      logger: storeLogger(new LogStore()),
    });

    await expect(server.start()).rejects.toBeInstanceOf(SetupError);
    expect(server.state).toBe("idle");
  });

  it("refuses to start twice", async () => {
    await withServer({}, async ({ server }) => {
      await expect(server.start()).rejects.toThrow("Server is already started");
    });
  });

  it("closes live connections on stop", async () => {
    const socketFactory = new InMemorySocketFactory();
    const server = new CannedServer({
      socketFactory,
      config: { ...defaultConfig(), port: 0 },
      logger: storeLogger(new LogStore()),
    });
    await server.start();

    const idle = socketFactory.connect();
    await tick();
    await server.stop();

    await idle.response;
    expect(idle.closed).toBe(true);
    expect(server.state).toBe("stopped");
    await expect(server.start()).rejects.toThrow("Server has been stopped");
  });

  it("closes connections still waiting for a worker on stop", async () => {
    const socketFactory = new InMemorySocketFactory();
    const server = new CannedServer({
      socketFactory,
      config: { ...defaultConfig(), port: 0, dispatch: "concurrent", maxConcurrency: 1 },
      logger: storeLogger(new LogStore()),
    });
    const responses: string[] = [];
    server.on("response", (path) => responses.push(path));
    await server.start();

    const running = socketFactory.connect();
    const queued = socketFactory.connect();
    await tick();
    await server.stop();

    await Promise.all([running.response, queued.response]);
    await tick();
    expect(running.closed).toBe(true);
    expect(queued.closed).toBe(true);
    expect(responses).toEqual([]);
    await expect(server.drain()).resolves.toBeUndefined();
  });
});
