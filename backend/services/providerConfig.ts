// services/providerConfig.ts
import type { ProviderName } from "../../types.js";

/* -----------------------------
   Types
----------------------------- */

export type DigikeyCredentials =
  | { kind: "access_token"; accessToken: string; clientId?: string }
  | { kind: "client_credentials"; clientId: string; clientSecret: string };

export interface MouserCredentials {
  apiKey: string;
}

export interface DigikeyLocale {
  site: string;
  language: string;
  currency: string;
}

export interface ProviderConfig {
  readonly digikey: Readonly<DigikeyCredentials> | null;
  readonly mouser: Readonly<MouserCredentials> | null;
  readonly digikeyLocale: Readonly<DigikeyLocale>;
  readonly digikeyApiBase: string;
  readonly mouserApiBase: string;
  readonly timeoutMs: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_TIMEOUT_MS = 10_000;

/* -----------------------------
   Public API
----------------------------- */

/**
 * Reads provider credentials and transport settings once.
 * Blank values count as missing; a client id without its secret
 * (or the reverse) does not configure Digi-Key.
 */
export function loadProviderConfig(env: Env = process.env): ProviderConfig {
  const clientId = clean(env.DIGIKEY_CLIENT_ID);
  const clientSecret = clean(env.DIGIKEY_CLIENT_SECRET);
  const accessToken = clean(env.DIGIKEY_ACCESS_TOKEN);
  const mouserKey = clean(env.MOUSER_API_KEY);

  let digikey: DigikeyCredentials | null = null;
  if (accessToken) {
    digikey = clientId
      ? { kind: "access_token", accessToken, clientId }
      : { kind: "access_token", accessToken };
  } else if (clientId && clientSecret) {
    digikey = { kind: "client_credentials", clientId, clientSecret };
  }

  const config: ProviderConfig = {
    digikey: digikey ? Object.freeze(digikey) : null,
    mouser: mouserKey ? Object.freeze({ apiKey: mouserKey }) : null,
    digikeyLocale: Object.freeze({
      site: clean(env.DIGIKEY_LOCALE_SITE) ?? "US",
      language: clean(env.DIGIKEY_LOCALE_LANGUAGE) ?? "en",
      currency: clean(env.DIGIKEY_LOCALE_CURRENCY) ?? "USD"
    }),
    digikeyApiBase: stripSlash(clean(env.DIGIKEY_API_BASE) ?? "https://api.digikey.com"),
    mouserApiBase: stripSlash(clean(env.MOUSER_API_BASE) ?? "https://api.mouser.com"),
    timeoutMs: parseTimeout(env.PROVIDER_TIMEOUT_MS)
  };

  return Object.freeze(config);
}

export function isConfigured(config: ProviderConfig, provider: ProviderName): boolean {
  switch (provider) {
    case "digikey":
      return config.digikey !== null;
    case "mouser":
      return config.mouser !== null;
  }
}

/** Log-safe view of the config: which providers are usable and how. */
export function describeConfig(config: ProviderConfig) {
  return {
    digikey: config.digikey ? config.digikey.kind : "not configured",
    mouser: config.mouser ? "api_key" : "not configured",
    locale: `${config.digikeyLocale.site}/${config.digikeyLocale.language}/${config.digikeyLocale.currency}`,
    timeoutMs: config.timeoutMs
  };
}

/* -----------------------------
   Helpers
----------------------------- */

function clean(value: string | undefined): string | undefined {
  const trimmed = (value ?? "").trim();
  return trimmed ? trimmed : undefined;
}

function stripSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function parseTimeout(raw: string | undefined): number {
  const parsed = parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}
