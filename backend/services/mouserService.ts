// services/mouserService.ts
import type { FetchOutcome, ProductInfo, ProviderAdapter } from "../../types.js";
import type { MouserCredentials } from "./providerConfig.js";
import {
  ProviderError,
  addAttribute,
  defaultFetch,
  isRecord,
  mpnKey,
  requestJson,
  textField,
  toFailure,
  type HttpFetch
} from "./providerHttp.js";

export interface MouserAdapterOptions {
  credentials: MouserCredentials;
  apiBase: string;
  timeoutMs: number;
  fetchImpl?: HttpFetch;
}

/**
 * Secondary catalog: Mouser Search API v1, exact part-number search.
 * Attribute names come straight from ProductAttributes.
 */
export class MouserAdapter implements ProviderAdapter {
  readonly name = "mouser";
  private readonly fetchImpl: HttpFetch;

  constructor(private readonly options: MouserAdapterOptions) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  async fetch(mpn: string): Promise<FetchOutcome> {
    const url =
      `${this.options.apiBase}/api/v1/search/partnumber` +
      `?apiKey=${encodeURIComponent(this.options.credentials.apiKey)}`;

    try {
      const data = await requestJson(
        this.fetchImpl,
        url,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json"
          },
          body: JSON.stringify({
            SearchByPartRequest: {
              mouserPartNumber: mpn,
              partSearchOptions: "Exact"
            }
          })
        },
        { timeoutMs: this.options.timeoutMs, label: "Mouser part search" }
      );
      return parseSearchResponse(data, mpn);
    } catch (err) {
      const failure = toFailure(err);
      console.warn(`[mouser] lookup failed for ${mpn}:`, failure);
      return { ok: false, failure };
    }
  }
}

/* -----------------------------
   Response Parsing
----------------------------- */

export function parseSearchResponse(data: unknown, mpn: string): FetchOutcome {
  if (!isRecord(data)) {
    throw new ProviderError("malformed_response", "Mouser response is not an object");
  }

  // Mouser reports bad keys and quota problems as 200 + Errors[]
  const errors = Array.isArray(data.Errors) ? data.Errors : [];
  if (errors.length > 0) {
    const message = errors
      .map(e => (isRecord(e) ? textField(e, "Message") ?? textField(e, "Code") : undefined))
      .filter((m): m is string => m !== undefined)
      .join("; ");
    throw new ProviderError(classifyMouserError(message), `Mouser error: ${message || "unknown"}`);
  }

  if (!isRecord(data.SearchResults)) {
    throw new ProviderError("malformed_response", "Mouser response has no SearchResults");
  }

  const parts = Array.isArray(data.SearchResults.Parts)
    ? data.SearchResults.Parts.filter(isRecord)
    : [];

  const part = pickPart(parts, mpn);
  if (!part) {
    return { ok: true, attributes: new Map(), product: {} };
  }

  const attributes = new Map<string, string>();
  const productAttributes: unknown[] = Array.isArray(part.ProductAttributes)
    ? part.ProductAttributes
    : [];
  for (const attr of productAttributes) {
    if (!isRecord(attr)) continue;
    addAttribute(attributes, attr.AttributeName, attr.AttributeValue);
  }

  return { ok: true, attributes, product: productInfo(part) };
}

export function classifyMouserError(message: string): ProviderError["reason"] {
  const lower = message.toLowerCase();
  if (lower.includes("key") || lower.includes("identifier") || lower.includes("unauthorized")) {
    return "auth_error";
  }
  if (lower.includes("rate") || lower.includes("limit") || lower.includes("too many")) {
    return "rate_limited";
  }
  return "malformed_response";
}

/** Exact MPN (ignoring punctuation and case) beats list position. */
function pickPart(
  parts: Record<string, unknown>[],
  mpn: string
): Record<string, unknown> | undefined {
  const wanted = mpnKey(mpn);
  const exact = parts.find(p => {
    const candidate = textField(p, "ManufacturerPartNumber");
    return candidate !== undefined && mpnKey(candidate) === wanted;
  });
  return exact ?? parts[0];
}

function productInfo(part: Record<string, unknown>): ProductInfo {
  return {
    productUrl: textField(part, "ProductDetailUrl"),
    datasheetUrl: textField(part, "DataSheetUrl"),
    manufacturer: textField(part, "Manufacturer"),
    manufacturerPartNumber: textField(part, "ManufacturerPartNumber"),
    description: textField(part, "Description"),
    category: textField(part, "Category")
  };
}
