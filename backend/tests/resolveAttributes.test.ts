import { describe, it, expect, vi } from "vitest";
import type { FetchOutcome, ProviderAdapter, ProviderName } from "../../types.js";
import {
  nextState,
  resolveAttributes,
  type ProviderSlots
} from "../services/resolveAttributes.js";

function ok(entries: [string, string][]): FetchOutcome {
  return { ok: true, attributes: new Map(entries), product: {} };
}

function fail(reason: "auth_error" | "not_found" | "network_error", message: string = reason): FetchOutcome {
  return { ok: false, failure: { reason, message } };
}

function stubAdapter(name: ProviderName, outcome: FetchOutcome) {
  const fetch = vi.fn(async (_mpn: string) => outcome);
  const adapter: ProviderAdapter = { name, fetch };
  return { adapter, fetch };
}

function slots(
  primary: ProviderAdapter | null,
  secondary: ProviderAdapter | null
): ProviderSlots {
  return {
    primary: { provider: "digikey", adapter: primary },
    secondary: { provider: "mouser", adapter: secondary }
  };
}

describe("nextState", () => {
  it("starts with the primary provider", () => {
    expect(nextState({ phase: "NOT_STARTED" }, null, true)).toEqual({ phase: "TRY_PRIMARY" });
  });

  it("falls through to the secondary only when it is configured", () => {
    const step = { provider: "digikey" as const, configured: true as const, outcome: fail("not_found") };
    expect(nextState({ phase: "TRY_PRIMARY" }, step, true)).toEqual({ phase: "TRY_SECONDARY" });
    expect(nextState({ phase: "TRY_PRIMARY" }, step, false)).toEqual({ phase: "DONE", answer: null });
  });

  it("finishes after the secondary whatever it returned", () => {
    const step = { provider: "mouser" as const, configured: true as const, outcome: ok([]) };
    expect(nextState({ phase: "TRY_SECONDARY" }, step, true)).toEqual({ phase: "DONE", answer: null });
  });

  it("stays done", () => {
    const done = { phase: "DONE" as const, answer: null };
    expect(nextState(done, null, true)).toBe(done);
  });
});

describe("resolveAttributes", () => {
  it("returns the primary answer without consulting the secondary", async () => {
    const primary = stubAdapter("digikey", ok([["Package", "SOIC-8"]]));
    const secondary = stubAdapter("mouser", ok([["Package", "DIP-8"]]));

    const result = await resolveAttributes("ABC123", slots(primary.adapter, secondary.adapter));

    expect(result.provider).toBe("digikey");
    expect([...result.attributes]).toEqual([["Package", "SOIC-8"]]);
    expect(result.failure).toBeUndefined();
    expect(result.attempts).toEqual([{ provider: "digikey", outcome: "ok" }]);
    expect(primary.fetch).toHaveBeenCalledWith("ABC123");
    expect(secondary.fetch).not.toHaveBeenCalled();
  });

  it("falls back when the primary fails", async () => {
    const primary = stubAdapter("digikey", fail("network_error", "timed out"));
    const secondary = stubAdapter("mouser", ok([["Tolerance", "5%"]]));

    const result = await resolveAttributes("XYZ789", slots(primary.adapter, secondary.adapter));

    expect(result.provider).toBe("mouser");
    expect([...result.attributes]).toEqual([["Tolerance", "5%"]]);
    expect(result.failure).toBeUndefined();
    expect(result.attempts).toEqual([
      { provider: "digikey", outcome: "network_error" },
      { provider: "mouser", outcome: "ok" }
    ]);
    expect(primary.fetch).toHaveBeenCalledTimes(1);
    expect(secondary.fetch).toHaveBeenCalledTimes(1);
  });

  it("falls back when the primary answers with no attributes", async () => {
    const primary = stubAdapter("digikey", ok([]));
    const secondary = stubAdapter("mouser", ok([["Voltage", "3.3V"]]));

    const result = await resolveAttributes("XYZ789", slots(primary.adapter, secondary.adapter));

    expect(result.provider).toBe("mouser");
    expect(result.attempts).toEqual([
      { provider: "digikey", outcome: "empty" },
      { provider: "mouser", outcome: "ok" }
    ]);
  });

  it("uses the secondary when the primary is not configured", async () => {
    const secondary = stubAdapter("mouser", ok([["Voltage", "3.3V"]]));

    const result = await resolveAttributes("XYZ789", slots(null, secondary.adapter));

    expect(result.provider).toBe("mouser");
    expect(result.attempts).toEqual([{ provider: "mouser", outcome: "ok" }]);
  });

  it("reports no_provider_configured when neither provider is usable", async () => {
    const result = await resolveAttributes("XYZ789", slots(null, null));

    expect(result.provider).toBeNull();
    expect(result.attributes.size).toBe(0);
    expect(result.failure).toEqual({
      reason: "no_provider_configured",
      message: "No catalog provider is configured"
    });
    expect(result.attempts).toEqual([]);
  });

  it("carries the last failure when every provider is exhausted", async () => {
    const primary = stubAdapter("digikey", fail("auth_error", "bad token"));
    const secondary = stubAdapter("mouser", fail("not_found", "no such part"));

    const result = await resolveAttributes("XYZ789", slots(primary.adapter, secondary.adapter));

    expect(result.provider).toBeNull();
    expect(result.attributes.size).toBe(0);
    expect(result.failure).toEqual({ reason: "not_found", message: "no such part" });
  });

  it("keeps the primary failure when the secondary is not configured", async () => {
    const primary = stubAdapter("digikey", fail("auth_error", "bad token"));

    const result = await resolveAttributes("XYZ789", slots(primary.adapter, null));

    expect(result.failure).toEqual({ reason: "auth_error", message: "bad token" });
    expect(result.attempts).toEqual([{ provider: "digikey", outcome: "auth_error" }]);
  });

  it("reports an empty secondary answer as not_found", async () => {
    const primary = stubAdapter("digikey", fail("network_error"));
    const secondary = stubAdapter("mouser", ok([]));

    const result = await resolveAttributes("XYZ789", slots(primary.adapter, secondary.adapter));

    expect(result.failure).toEqual({ reason: "not_found", message: "mouser returned no attributes" });
  });

  it("does not call any provider for a blank MPN", async () => {
    const primary = stubAdapter("digikey", ok([["Package", "SOIC-8"]]));

    const result = await resolveAttributes("   ", slots(primary.adapter, null));

    expect(result.failure).toEqual({ reason: "not_found", message: "MPN is empty" });
    expect(primary.fetch).not.toHaveBeenCalled();
  });

  it("trims the MPN before querying", async () => {
    const primary = stubAdapter("digikey", ok([["Package", "SOIC-8"]]));

    const result = await resolveAttributes("  ABC123 ", slots(primary.adapter, null));

    expect(result.mpn).toBe("ABC123");
    expect(primary.fetch).toHaveBeenCalledWith("ABC123");
  });

  it("gives identical results for identical provider answers", async () => {
    const primary = stubAdapter("digikey", fail("not_found"));
    const secondary = stubAdapter("mouser", ok([["Package", "soic-8"], ["Voltage", "3.3V"]]));
    const providers = slots(primary.adapter, secondary.adapter);

    const first = await resolveAttributes("XYZ789", providers);
    const second = await resolveAttributes("XYZ789", providers);

    expect(second).toEqual(first);
    expect([...second.attributes]).toEqual([...first.attributes]);
  });

  it("returns a frozen result", async () => {
    const result = await resolveAttributes("XYZ789", slots(null, null));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.attempts)).toBe(true);
  });
});
