import { vi } from "vitest";
import { Response, type RequestInit } from "node-fetch";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** In-process stand-in for node-fetch; records every call. */
export function fakeFetch(
  handler: (url: string, init?: RequestInit) => Response | Promise<Response>
) {
  return vi.fn(async (url: string, init?: RequestInit) => handler(url, init));
}

export function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  const headers = init?.headers;
  if (!headers || Array.isArray(headers) || typeof headers !== "object") return undefined;
  if (!isPlainHeaders(headers)) return undefined;
  return headers[name];
}

function isPlainHeaders(value: object): value is Record<string, string> {
  return Object.values(value).every(v => typeof v === "string");
}
