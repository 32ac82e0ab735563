// utils/response.ts
// JSON response helpers.

import type { ServerResponse } from "node:http";

export function send(res: ServerResponse, status: number, data?: unknown, headers: Record<string, string> = {}): void {
  const body = data === undefined ? "" : JSON.stringify(data);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(body).toString(),
    ...headers,
  });
  res.end(body);
}

export const ok = (res: ServerResponse, data: unknown) => send(res, 200, data);
export const notFound = (res: ServerResponse, msg = "Not Found") => send(res, 404, { error: msg });
