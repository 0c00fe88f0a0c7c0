export interface HttpRequestLine {
  readonly method: string;
  readonly target: string;
  readonly httpVersion: string;
}

export interface HttpRequest extends HttpRequestLine {
  /** Target with any query string removed; the part routes match on. */
  readonly path: string;
  readonly raw: Uint8Array;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Map<string, string>;
  body: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
};

export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? "Unknown";
}
