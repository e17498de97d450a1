// services/replacementSearch.ts
import type {
  BaseMode,
  ReplacementCandidate,
  ReplacementReport,
  SearchIteration,
  SearchValue
} from "../../types.js";
import { parseProductDetails, type DigikeyAdapter } from "./digikeyService.js";
import { mpnKey, toFailure } from "./providerHttp.js";
import { resolveAttributes } from "./resolveAttributes.js";
import { createDigikeyAdapter, createProviderSlots, type PipelineDeps } from "./runComparison.js";

const RECORD_COUNT = 50;
// Listing order stands in for importance; values past this are never filtered on.
const MAX_FILTER_VALUES = 8;
const FALLBACK_VALUE_COUNT = 3;
const MATCH_REASON_COUNT = 6;

export interface ReplacementOptions {
  baseMode?: BaseMode;
  // false: report the first try even when it finds nothing
  requireResults?: boolean;
}

/**
 * Looks the part up, then searches Digi-Key for other parts sharing its
 * parameter values. Each try that finds nothing drops the last value
 * still in use, until something is found or no value is left.
 */
export async function findReplacements(
  mpn: string,
  deps: PipelineDeps,
  options: ReplacementOptions = {}
): Promise<ReplacementReport> {
  const wanted = mpn.trim();
  const baseMode = options.baseMode ?? "any";
  const requireResults = options.requireResults ?? true;
  const iterations: SearchIteration[] = [];

  const digikey = createDigikeyAdapter(deps);
  if (!digikey) {
    return {
      ok: false,
      mpn: wanted,
      failure: {
        reason: "no_provider_configured",
        message: "Replacement search needs Digi-Key credentials"
      },
      iterations
    };
  }

  // Same adapter for the lookup and the searches: one token.
  const base = await resolveAttributes(wanted, createProviderSlots(deps, digikey));
  if (!base.provider) {
    return {
      ok: false,
      mpn: base.mpn,
      failure: base.failure ?? { reason: "not_found", message: `${base.mpn} has no attributes` },
      iterations
    };
  }

  const values = [...base.attributes].map(([name, value]) => ({ name, value }));
  const used = values.slice(0, MAX_FILTER_VALUES);
  const dropped = values.slice(MAX_FILTER_VALUES);
  const baseKeywords = base.product?.category ?? "";
  const tokens = baseTokens(wanted);
  let candidates: ReplacementCandidate[] = [];

  try {
    for (;;) {
      const products = await searchOnce(digikey, baseKeywords, used);
      const matchReasons = used
        .slice(0, MATCH_REASON_COUNT)
        .map(v => `${v.name} = ${v.value}`);
      candidates = filterCandidates(
        products
          .map(p => toCandidate(p, matchReasons))
          .filter((c): c is ReplacementCandidate => c !== null),
        wanted,
        baseMode,
        tokens
      );

      iterations.push({
        attempt: iterations.length + 1,
        usedValues: [...used],
        droppedValueCount: dropped.length,
        results: candidates.length
      });
      console.log("[replace] attempt", {
        mpn: wanted,
        attempt: iterations.length,
        usedValues: used.length,
        results: candidates.length
      });

      if (candidates.length > 0 || !requireResults) break;
      const last = used.pop();
      if (!last) break;
      dropped.push(last);
    }
  } catch (err) {
    const failure = toFailure(err);
    console.warn(`[replace] search failed for ${wanted}:`, failure);
    return { ok: false, mpn: base.mpn, failure, iterations };
  }

  return {
    ok: true,
    mpn: base.mpn,
    baseProvider: base.provider,
    baseKeywords,
    baseMode,
    baseTokens: tokens,
    usedValues: used,
    droppedValues: dropped,
    iterations,
    candidates
  };
}

/* -----------------------------
   One Try
----------------------------- */

/** Parameter filters first, then plain keyword searches; first non-empty answer wins. */
async function searchOnce(
  digikey: DigikeyAdapter,
  baseKeywords: string,
  used: SearchValue[]
): Promise<Record<string, unknown>[]> {
  if (used.length > 0) {
    const filtered = await digikey.searchKeyword({
      Keywords: baseKeywords,
      RecordCount: RECORD_COUNT,
      Filters: {
        ParameterFilters: used.map(v => ({ ParameterText: v.name, ValueText: v.value }))
      }
    });
    if (filtered.length > 0) return filtered;
  }

  for (const keywords of fallbackKeywords(baseKeywords, used)) {
    const products = await digikey.searchKeyword({ Keywords: keywords, RecordCount: RECORD_COUNT });
    if (products.length > 0) return products;
  }
  return [];
}

/**
 * Base keywords alone, then with the first few values, then with each
 * of those values on its own. Blank and repeated strings are skipped.
 */
export function fallbackKeywords(baseKeywords: string, used: SearchValue[]): string[] {
  const top = used.slice(0, FALLBACK_VALUE_COUNT);
  const attempts = [
    baseKeywords,
    joinKeywords(baseKeywords, top),
    ...top.map(v => joinKeywords(baseKeywords, [v]))
  ];

  const seen = new Set<string>();
  const out: string[] = [];
  for (const attempt of attempts) {
    const keywords = attempt.trim();
    if (!keywords || seen.has(keywords.toLowerCase())) continue;
    seen.add(keywords.toLowerCase());
    out.push(keywords);
  }
  return out;
}

function joinKeywords(baseKeywords: string, values: SearchValue[]): string {
  return [baseKeywords, ...values.map(v => v.value.replace(/\s+/g, " "))]
    .filter(Boolean)
    .join(" ");
}

function toCandidate(
  record: Record<string, unknown>,
  matchReasons: string[]
): ReplacementCandidate | null {
  const outcome = parseProductDetails(record);
  if (!outcome.ok) return null;

  const { product } = outcome;
  if (!product.manufacturerPartNumber) return null;

  return {
    mpn: product.manufacturerPartNumber,
    manufacturer: product.manufacturer,
    description: product.description,
    productUrl: product.productUrl,
    attributes: outcome.attributes,
    matchReasons
  };
}

/* -----------------------------
   Part Families
----------------------------- */

/** Digit runs of three or more in the normalized MPN, longest first. */
export function baseTokens(mpn: string): string[] {
  const runs = new Set(mpnKey(mpn).match(/\d{3,}/g) ?? []);
  return [...runs].sort((a, b) => b.length - a.length || a.localeCompare(b));
}

/** Never offers the part itself; baseMode then keeps or drops its family. */
export function filterCandidates(
  candidates: ReplacementCandidate[],
  mpn: string,
  baseMode: BaseMode,
  tokens: string[]
): ReplacementCandidate[] {
  const original = mpnKey(mpn);
  return candidates.filter(candidate => {
    const key = mpnKey(candidate.mpn);
    if (key === original) return false;
    if (baseMode === "any") return true;

    const sameFamily = tokens.some(token => key.includes(token));
    return baseMode === "only_base" ? sameFamily : !sameFamily;
  });
}
