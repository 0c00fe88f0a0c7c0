import { pathOf } from "./request-reader.js";

export interface Route {
  readonly pattern: string;
  readonly status: number;
  readonly contentType: string;
  readonly body: string;
}

export interface RouteTable {
  readonly routes: readonly Route[];
  /** Returned when no pattern matches. */
  readonly notFound: Route;
}

export type RouteTableName = "plain" | "json";

const TEXT = "text/plain";
const JSON_TYPE = "application/json";

export const PLAIN_ROUTES: RouteTable = freezeTable({
  routes: [{ pattern: "/health", status: 200, contentType: TEXT, body: "OK" }],
  notFound: { pattern: "*", status: 404, contentType: TEXT, body: "Not Found" },
});

export const JSON_ROUTES: RouteTable = freezeTable({
  routes: [
    {
      pattern: "/",
      status: 200,
      contentType: JSON_TYPE,
      body: JSON.stringify({
        message: "Canned API Server",
        version: "1.0.0",
        endpoints: ["/", "/health", "/users"],
      }),
    },
    {
      pattern: "/health",
      status: 200,
      contentType: JSON_TYPE,
      body: JSON.stringify({ status: "healthy" }),
    },
    {
      pattern: "/users",
      status: 200,
      contentType: JSON_TYPE,
      body: JSON.stringify({
        users: [
          { id: 1, name: "Alice", email: "alice@example.com" },
          { id: 2, name: "Bob", email: "bob@example.com" },
        ],
      }),
    },
  ],
  notFound: {
    pattern: "*",
    status: 404,
    contentType: JSON_TYPE,
    body: JSON.stringify({ error: "Not found" }),
  },
});

export const ROUTE_TABLES: Readonly<Record<RouteTableName, RouteTable>> = {
  plain: PLAIN_ROUTES,
  json: JSON_ROUTES,
};

export function isRouteTableName(value: string): value is RouteTableName {
  return value === "plain" || value === "json";
}

function freezeTable(table: RouteTable): RouteTable {
  return Object.freeze({
    routes: Object.freeze(table.routes.map((route) => Object.freeze({ ...route }))),
    notFound: Object.freeze({ ...table.notFound }),
  });
}

/**
 * Exact-match router over an ordered route table. The first route whose
 * pattern equals the request path wins; the query string is ignored.
 */
export class Router {
  private readonly table: RouteTable;

  constructor(table: RouteTable = PLAIN_ROUTES) {
    this.table = freezeTable(table);
  }

  get routes(): readonly Route[] {
    return this.table.routes;
  }

  get notFound(): Route {
    return this.table.notFound;
  }

  route(target: string): Route {
    const path = pathOf(target);
    return (
      this.table.routes.find((route) => route.pattern === path) ??
      this.table.notFound
    );
  }
}
