// services/runComparison.ts
import type { ComparisonReport, LookupResult } from "../../types.js";
import type { ProviderConfig } from "./providerConfig.js";
import type { ProviderSlots } from "./resolveAttributes.js";
import { DigikeyAdapter } from "./digikeyService.js";
import { MouserAdapter } from "./mouserService.js";
import { defaultFetch, type HttpFetch } from "./providerHttp.js";
import { resolveAttributes } from "./resolveAttributes.js";
import { buildComparisonReport } from "./compareAttributes.js";

export interface PipelineDeps {
  config: ProviderConfig;
  fetchImpl?: HttpFetch;
  now?: () => number;
}

export function createDigikeyAdapter(deps: PipelineDeps): DigikeyAdapter | null {
  const { config } = deps;
  if (!config.digikey) return null;
  return new DigikeyAdapter({
    credentials: config.digikey,
    locale: config.digikeyLocale,
    apiBase: config.digikeyApiBase,
    timeoutMs: config.timeoutMs,
    fetchImpl: deps.fetchImpl ?? defaultFetch,
    now: deps.now
  });
}

/**
 * Fresh adapters for one lookup. Digi-Key is always primary and
 * Mouser secondary; a provider without credentials gets a null adapter.
 * Pass a Digi-Key adapter to share its token with other calls.
 */
export function createProviderSlots(
  deps: PipelineDeps,
  digikey: DigikeyAdapter | null = createDigikeyAdapter(deps)
): ProviderSlots {
  const { config } = deps;

  return {
    primary: { provider: "digikey", adapter: digikey },
    secondary: {
      provider: "mouser",
      adapter: config.mouser
        ? new MouserAdapter({
            credentials: config.mouser,
            apiBase: config.mouserApiBase,
            timeoutMs: config.timeoutMs,
            fetchImpl: deps.fetchImpl ?? defaultFetch
          })
        : null
    }
  };
}

export async function lookupPart(mpn: string, deps: PipelineDeps): Promise<LookupResult> {
  return resolveAttributes(mpn, createProviderSlots(deps));
}

/**
 * Both sides resolve concurrently with their own adapters (and tokens);
 * a failed side still yields a report.
 */
export async function runComparison(
  input: { mpnLeft: string; mpnRight: string },
  deps: PipelineDeps
): Promise<ComparisonReport> {
  const [left, right] = await Promise.all([
    lookupPart(input.mpnLeft, deps),
    lookupPart(input.mpnRight, deps)
  ]);

  const report = buildComparisonReport(left, right);
  console.log("[compare] done", {
    left: `${left.mpn} via ${left.provider ?? "none"}`,
    right: `${right.mpn} via ${right.provider ?? "none"}`,
    rows: report.rows.length,
    matches: report.rows.filter(r => r.match).length
  });
  return report;
}
