// services/digikeyService.ts
import type { FetchOutcome, ProductInfo, ProviderAdapter } from "../../types.js";
import type { DigikeyCredentials, DigikeyLocale } from "./providerConfig.js";
import { createTokenSource, type TokenSource } from "./digikeyAuth.js";
import {
  ProviderError,
  addAttribute,
  defaultFetch,
  isRecord,
  requestJson,
  textField,
  toFailure,
  type HttpFetch
} from "./providerHttp.js";

export interface KeywordSearchBody {
  Keywords: string;
  RecordCount: number;
  Filters?: { ParameterFilters: { ParameterText: string; ValueText: string }[] };
}

export interface DigikeyAdapterOptions {
  credentials: DigikeyCredentials;
  locale: DigikeyLocale;
  apiBase: string;
  timeoutMs: number;
  fetchImpl?: HttpFetch;
  now?: () => number;
}

/**
 * Primary catalog: Digi-Key Product Information v4, product details by MPN.
 * Parameter names are kept exactly as Digi-Key labels them.
 */
export class DigikeyAdapter implements ProviderAdapter {
  readonly name = "digikey";
  private readonly tokens: TokenSource;
  private readonly fetchImpl: HttpFetch;

  constructor(private readonly options: DigikeyAdapterOptions) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.tokens = createTokenSource(options.credentials, {
      apiBase: options.apiBase,
      timeoutMs: options.timeoutMs,
      fetchImpl: this.fetchImpl,
      now: options.now
    });
  }

  async fetch(mpn: string): Promise<FetchOutcome> {
    try {
      const token = await this.tokens.getToken();
      const data = await requestJson(
        this.fetchImpl,
        `${this.options.apiBase}/products/v4/search/${encodeURIComponent(mpn)}/productdetails`,
        { method: "GET", headers: this.headers(token) },
        { timeoutMs: this.options.timeoutMs, label: "Digi-Key product details" }
      );
      return parseProductDetails(data);
    } catch (err) {
      const failure = toFailure(err);
      console.warn(`[digikey] lookup failed for ${mpn}:`, failure);
      return { ok: false, failure };
    }
  }

  /**
   * One keyword search (optionally narrowed by parameter filters).
   * Failures are thrown as ProviderError; the caller decides what to do.
   */
  async searchKeyword(body: KeywordSearchBody): Promise<Record<string, unknown>[]> {
    const token = await this.tokens.getToken();
    const data = await requestJson(
      this.fetchImpl,
      `${this.options.apiBase}/products/v4/search/keyword`,
      {
        method: "POST",
        headers: { ...this.headers(token), "Content-Type": "application/json" },
        body: JSON.stringify(body)
      },
      { timeoutMs: this.options.timeoutMs, label: "Digi-Key keyword search" }
    );
    return extractProducts(data);
  }

  private headers(token: string): Record<string, string> {
    const { site, language, currency } = this.options.locale;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
      "X-DIGIKEY-Locale-Site": site,
      "X-DIGIKEY-Locale-Language": language,
      "X-DIGIKEY-Locale-Currency": currency
    };
    if (this.tokens.clientId) {
      headers["X-DIGIKEY-Client-Id"] = this.tokens.clientId;
    }
    return headers;
  }
}

/* -----------------------------
   Response Parsing
----------------------------- */

export function parseProductDetails(data: unknown): FetchOutcome {
  if (!isRecord(data)) {
    throw new ProviderError("malformed_response", "Digi-Key response is not an object");
  }

  // v4 wraps the part in Product; some gateways return it bare.
  const product = isRecord(data.Product) ? data.Product : data;

  const attributes = new Map<string, string>();
  if (product.Parameters !== undefined && !Array.isArray(product.Parameters)) {
    throw new ProviderError("malformed_response", "Digi-Key Parameters is not a list");
  }
  const parameters: unknown[] = Array.isArray(product.Parameters) ? product.Parameters : [];
  for (const param of parameters) {
    if (!isRecord(param)) continue;
    addAttribute(
      attributes,
      param.ParameterText ?? param.Parameter,
      param.ValueText ?? param.Value
    );
  }

  return { ok: true, attributes, product: productInfo(product) };
}

/** Keyword search answers carry Products (or products, behind some gateways). */
export function extractProducts(data: unknown): Record<string, unknown>[] {
  if (!isRecord(data)) {
    throw new ProviderError("malformed_response", "Digi-Key response is not an object");
  }
  const products = data.Products ?? data.products ?? [];
  if (!Array.isArray(products)) {
    throw new ProviderError("malformed_response", "Digi-Key Products is not a list");
  }
  return products.filter(isRecord);
}

function productInfo(product: Record<string, unknown>): ProductInfo {
  const description = isRecord(product.Description)
    ? textField(product.Description, "ProductDescription") ??
      textField(product.Description, "DetailedDescription")
    : textField(product, "ProductDescription");

  return {
    productUrl: textField(product, "ProductUrl"),
    datasheetUrl: textField(product, "DatasheetUrl"),
    manufacturer: isRecord(product.Manufacturer)
      ? textField(product.Manufacturer, "Name")
      : textField(product, "Manufacturer"),
    manufacturerPartNumber:
      textField(product, "ManufacturerProductNumber") ??
      textField(product, "ManufacturerPartNumber"),
    description,
    category: isRecord(product.Category) ? textField(product.Category, "Name") : undefined
  };
}
