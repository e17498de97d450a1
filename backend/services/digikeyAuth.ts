// services/digikeyAuth.ts
import { URLSearchParams } from "url";
import type { DigikeyCredentials } from "./providerConfig.js";
import { ProviderError, isRecord, requestJson, type HttpFetch } from "./providerHttp.js";

// Refresh a little before the provider says the token dies.
const EXPIRY_MARGIN_MS = 60_000;

export interface TokenSource {
  readonly kind: DigikeyCredentials["kind"];
  readonly clientId?: string;
  getToken(): Promise<string>;
}

export interface TokenSourceOptions {
  apiBase: string;
  timeoutMs: number;
  fetchImpl: HttpFetch;
  now?: () => number;
}

/**
 * Picks the auth strategy from the credential variant. Each instance
 * keeps its own token, so concurrent lookups never share one.
 */
export function createTokenSource(
  credentials: DigikeyCredentials,
  options: TokenSourceOptions
): TokenSource {
  switch (credentials.kind) {
    case "access_token":
      return {
        kind: "access_token",
        clientId: credentials.clientId,
        getToken: async () => credentials.accessToken
      };
    case "client_credentials":
      return new ClientCredentialsTokenSource(
        credentials.clientId,
        credentials.clientSecret,
        options
      );
  }
}

class ClientCredentialsTokenSource implements TokenSource {
  readonly kind = "client_credentials";
  private cached: { token: string; expiresAt: number } | null = null;
  private readonly now: () => number;

  constructor(
    readonly clientId: string,
    private readonly clientSecret: string,
    private readonly options: TokenSourceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.token;
    }

    const body = new URLSearchParams({
      client_id: this.clientId,
      client_secret: this.clientSecret,
      grant_type: "client_credentials"
    });

    let data: unknown;
    try {
      data = await requestJson(
        this.options.fetchImpl,
        `${this.options.apiBase}/v1/oauth2/token`,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: body.toString()
        },
        { timeoutMs: this.options.timeoutMs, label: "Digi-Key token exchange" }
      );
    } catch (err) {
      // Any exchange failure means we cannot authenticate.
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderError("auth_error", message);
    }

    const token = isRecord(data) ? data.access_token : undefined;
    if (typeof token !== "string" || !token) {
      throw new ProviderError("auth_error", "Digi-Key token exchange returned no access_token");
    }

    const expiresInSec = isRecord(data) && typeof data.expires_in === "number" ? data.expires_in : 0;
    this.cached = {
      token,
      expiresAt: this.now() + expiresInSec * 1000 - EXPIRY_MARGIN_MS
    };

    console.log("[digikey] obtained access token", { expiresInSec });
    return token;
  }
}
