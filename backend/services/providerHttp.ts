// services/providerHttp.ts
import fetch, { type RequestInit, type Response } from "node-fetch";
import type { FetchFailure } from "../../types.js";

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);

/**
 * Carries a classified reason from deep inside an adapter up to its
 * boundary, where it is turned into a FetchFailure value.
 */
export class ProviderError extends Error {
  constructor(
    public readonly reason: FetchFailure["reason"],
    message: string
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

export function toFailure(err: unknown): FetchFailure {
  if (err instanceof ProviderError) {
    return { reason: err.reason, message: err.message };
  }
  if (err instanceof Error) {
    return { reason: "network_error", message: err.message };
  }
  return { reason: "network_error", message: String(err) };
}

/* -----------------------------
   Requests
----------------------------- */

export function classifyStatus(status: number): FetchFailure["reason"] {
  if (status === 401 || status === 403) return "auth_error";
  if (status === 404) return "not_found";
  if (status === 429) return "rate_limited";
  return "network_error";
}

/**
 * One HTTP round-trip with a hard timeout. Non-2xx statuses and
 * unparseable bodies are thrown as ProviderError.
 */
export async function requestJson(
  fetchImpl: HttpFetch,
  url: string,
  init: RequestInit,
  options: { timeoutMs: number; label: string }
): Promise<unknown> {
  const { res, text } = await send(fetchImpl, url, init, options);

  if (!res.ok) {
    throw new ProviderError(
      classifyStatus(res.status),
      `${options.label} responded ${res.status}${text ? `: ${redactUrls(text.slice(0, 200))}` : ""}`
    );
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderError("malformed_response", `${options.label} returned a non-JSON body`);
  }
}

async function send(
  fetchImpl: HttpFetch,
  url: string,
  init: RequestInit,
  options: { timeoutMs: number; label: string }
): Promise<{ res: Response; text: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    const text = await res.text();
    return { res, text };
  } catch (err) {
    const message = controller.signal.aborted
      ? `${options.label} timed out after ${options.timeoutMs}ms`
      : `${options.label} request failed: ${redactUrls(err instanceof Error ? err.message : String(err))}`;
    throw new ProviderError("network_error", message);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Cuts the query and fragment off every URL in a message. Transport
 * errors quote the request URL, and Mouser's key travels in its query.
 */
export function redactUrls(message: string): string {
  return message.replace(/(https?:\/\/[^\s?#]*)[?#]\S*/g, "$1");
}

/* -----------------------------
   Normalization Helpers
----------------------------- */

const PLACEHOLDERS = new Set(["", "-", "—", "n/a", "na", "none", "null"]);
const TEXT_KEYS = ["Value", "value", "Text", "text", "Name", "name"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value.trim().toLowerCase());
}

/**
 * Reduces whatever the provider sent to a single display string,
 * or null when there is nothing worth showing.
 */
export function flattenValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;

  if (typeof value === "string") {
    const trimmed = value.trim();
    return isPlaceholder(trimmed) ? null : trimmed;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  if (Array.isArray(value)) {
    const parts = value
      .map(flattenValue)
      .filter((v): v is string => v !== null);
    return parts.length > 0 ? parts.join(", ") : null;
  }

  if (isRecord(value)) {
    for (const key of TEXT_KEYS) {
      const flat = flattenValue(value[key]);
      if (flat !== null) return flat;
    }
  }

  return null;
}

/** First occurrence of a name wins; blank names and empty values are skipped. */
export function addAttribute(target: Map<string, string>, name: unknown, value: unknown): void {
  if (typeof name !== "string") return;
  const key = name.trim();
  if (!key || target.has(key)) return;

  const flat = flattenValue(value);
  if (flat === null) return;

  target.set(key, flat);
}

export function textField(record: Record<string, unknown>, key: string): string | undefined {
  return flattenValue(record[key]) ?? undefined;
}

/** Upper-cased, alphanumerics only: how two MPN spellings are matched. */
export function mpnKey(mpn: string): string {
  return mpn.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}
