export type ProviderName = "digikey" | "mouser";

export type FailureReason =
  | "auth_error"
  | "not_found"
  | "rate_limited"
  | "network_error"
  | "malformed_response"
  | "no_provider_configured";

// Attribute name -> display string, in the order the provider listed them.
export type NormalizedAttributes = ReadonlyMap<string, string>;

export interface ProductInfo {
  productUrl?: string;
  datasheetUrl?: string;
  manufacturer?: string;
  manufacturerPartNumber?: string;
  description?: string;
  category?: string;
}

export interface FetchFailure {
  reason: Exclude<FailureReason, "no_provider_configured">;
  message: string;
}

export type FetchOutcome =
  | { ok: true; attributes: NormalizedAttributes; product: ProductInfo }
  | { ok: false; failure: FetchFailure };

export interface ProviderAdapter {
  readonly name: ProviderName;
  fetch(mpn: string): Promise<FetchOutcome>;
}

export interface LookupAttempt {
  provider: ProviderName;
  outcome: "ok" | "empty" | FetchFailure["reason"];
}

export interface LookupResult {
  readonly mpn: string;
  readonly attributes: NormalizedAttributes;
  readonly provider: ProviderName | null;
  readonly failure?: { reason: FailureReason; message: string };
  readonly product?: ProductInfo;
  readonly attempts: readonly LookupAttempt[];
}

export interface ComparisonRow {
  name: string;
  // null = the attribute is missing on that side
  valueLeft: string | null;
  valueRight: string | null;
  match: boolean;
}

export interface LookupSummary {
  mpn: string;
  providerUsed: ProviderName | null;
  failureReason?: FailureReason;
  failureMessage?: string;
  productUrl?: string;
  attributeCount: number;
}

export interface ComparisonReport {
  left: LookupSummary;
  right: LookupSummary;
  rows: ComparisonRow[];
}

/* -----------------------------
   Replacement Search
----------------------------- */

// exclude_base drops candidates from the searched part's own family,
// only_base keeps nothing else.
export type BaseMode = "any" | "exclude_base" | "only_base";

export interface SearchValue {
  name: string;
  value: string;
}

export interface SearchIteration {
  attempt: number;
  usedValues: SearchValue[];
  droppedValueCount: number;
  results: number;
}

export interface ReplacementCandidate {
  mpn: string;
  manufacturer?: string;
  description?: string;
  productUrl?: string;
  attributes: NormalizedAttributes;
  matchReasons: string[];
}

export type ReplacementReport =
  | {
      ok: true;
      mpn: string;
      baseProvider: ProviderName;
      baseKeywords: string;
      baseMode: BaseMode;
      baseTokens: string[];
      usedValues: SearchValue[];
      droppedValues: SearchValue[];
      iterations: SearchIteration[];
      candidates: ReplacementCandidate[];
      note?: string;
    }
  | {
      ok: false;
      mpn: string;
      failure: { reason: FailureReason; message: string };
      iterations: SearchIteration[];
    };
