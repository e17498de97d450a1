// services/resolveAttributes.ts
import type {
  FailureReason,
  FetchOutcome,
  LookupAttempt,
  LookupResult,
  NormalizedAttributes,
  ProductInfo,
  ProviderAdapter,
  ProviderName
} from "../../types.js";

/* -----------------------------
   Types
----------------------------- */

/** A provider in fallback order; adapter is null when it has no credentials. */
export interface ProviderSlot {
  provider: ProviderName;
  adapter: ProviderAdapter | null;
}

export interface ProviderSlots {
  primary: ProviderSlot;
  secondary: ProviderSlot;
}

interface Answer {
  provider: ProviderName;
  attributes: NormalizedAttributes;
  product: ProductInfo;
}

export type ResolveState =
  | { phase: "NOT_STARTED" }
  | { phase: "TRY_PRIMARY" }
  | { phase: "TRY_SECONDARY" }
  | { phase: "DONE"; answer: Answer | null };

export type SlotStep =
  | { provider: ProviderName; configured: false }
  | { provider: ProviderName; configured: true; outcome: FetchOutcome };

/* -----------------------------
   State Machine
----------------------------- */

/**
 * Pure transition function. `step` is what the current phase's provider
 * produced (null only when leaving NOT_STARTED).
 */
export function nextState(
  state: ResolveState,
  step: SlotStep | null,
  secondaryConfigured: boolean
): ResolveState {
  switch (state.phase) {
    case "NOT_STARTED":
      return { phase: "TRY_PRIMARY" };

    case "TRY_PRIMARY": {
      const answer = usableAnswer(step);
      if (answer) return { phase: "DONE", answer };
      return secondaryConfigured
        ? { phase: "TRY_SECONDARY" }
        : { phase: "DONE", answer: null };
    }

    case "TRY_SECONDARY":
      return { phase: "DONE", answer: usableAnswer(step) };

    case "DONE":
      return state;
  }
}

function usableAnswer(step: SlotStep | null): Answer | null {
  if (!step || !step.configured || !step.outcome.ok) return null;
  if (step.outcome.attributes.size === 0) return null;
  return {
    provider: step.provider,
    attributes: step.outcome.attributes,
    product: step.outcome.product
  };
}

/* -----------------------------
   Public API
----------------------------- */

/**
 * Looks one MPN up: primary first, secondary only if the primary is
 * unconfigured, failed or came back empty. Never mixes providers.
 */
export async function resolveAttributes(
  mpn: string,
  slots: ProviderSlots
): Promise<LookupResult> {
  const query = mpn.trim();
  if (!query) {
    return freezeResult({
      mpn: query,
      attributes: new Map(),
      provider: null,
      failure: { reason: "not_found", message: "MPN is empty" },
      attempts: []
    });
  }

  const attempts: LookupAttempt[] = [];
  let lastFailure: { reason: FailureReason; message: string } | null = null;
  let state: ResolveState = nextState({ phase: "NOT_STARTED" }, null, false);

  while (state.phase !== "DONE") {
    const slot = state.phase === "TRY_PRIMARY" ? slots.primary : slots.secondary;
    console.log(`[resolve] ${query}: ${state.phase} (${slot.provider})`);

    const step = await runSlot(slot, query);
    if (step.configured) {
      const { outcome } = step;
      if (!outcome.ok) {
        attempts.push({ provider: slot.provider, outcome: outcome.failure.reason });
        lastFailure = outcome.failure;
      } else if (outcome.attributes.size === 0) {
        attempts.push({ provider: slot.provider, outcome: "empty" });
        lastFailure = { reason: "not_found", message: `${slot.provider} returned no attributes` };
      } else {
        attempts.push({ provider: slot.provider, outcome: "ok" });
      }
    }

    state = nextState(state, step, slots.secondary.adapter !== null);
  }

  const answer = state.phase === "DONE" ? state.answer : null;
  if (answer) {
    console.log(`[resolve] ${query}: DONE via ${answer.provider}`, {
      attributes: answer.attributes.size
    });
    return freezeResult({
      mpn: query,
      attributes: answer.attributes,
      provider: answer.provider,
      product: answer.product,
      attempts
    });
  }

  const failure = lastFailure ?? {
    reason: "no_provider_configured" as const,
    message: "No catalog provider is configured"
  };
  console.warn(`[resolve] ${query}: DONE without attributes`, failure);

  return freezeResult({
    mpn: query,
    attributes: new Map(),
    provider: null,
    failure,
    attempts
  });
}

async function runSlot(slot: ProviderSlot, mpn: string): Promise<SlotStep> {
  if (!slot.adapter) {
    return { provider: slot.provider, configured: false };
  }
  const outcome = await slot.adapter.fetch(mpn);
  return { provider: slot.provider, configured: true, outcome };
}

function freezeResult(result: LookupResult): LookupResult {
  return Object.freeze({
    ...result,
    attributes: new Map(result.attributes),
    attempts: Object.freeze([...result.attempts])
  });
}
