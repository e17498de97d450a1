import { describe, it, expect } from "vitest";
import {
  ProviderError,
  addAttribute,
  classifyStatus,
  flattenValue,
  mpnKey,
  redactUrls,
  requestJson,
  toFailure
} from "../services/providerHttp.js";
import type { Response } from "node-fetch";
import { fakeFetch, jsonResponse, textResponse } from "./fakeFetch.js";

const options = { timeoutMs: 1000, label: "Test API" };

describe("classifyStatus", () => {
  it("maps provider statuses to failure reasons", () => {
    expect(classifyStatus(401)).toBe("auth_error");
    expect(classifyStatus(403)).toBe("auth_error");
    expect(classifyStatus(404)).toBe("not_found");
    expect(classifyStatus(429)).toBe("rate_limited");
    expect(classifyStatus(500)).toBe("network_error");
    expect(classifyStatus(502)).toBe("network_error");
  });
});

describe("requestJson", () => {
  it("returns the parsed body on success", async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ hello: "world" }));
    await expect(requestJson(fetchImpl, "https://example.test/a", {}, options)).resolves.toEqual({
      hello: "world"
    });
  });

  it("throws a classified error for non-2xx responses", async () => {
    const fetchImpl = fakeFetch(() => textResponse("slow down", 429));
    await expect(requestJson(fetchImpl, "https://example.test/a", {}, options)).rejects.toMatchObject({
      reason: "rate_limited",
      message: "Test API responded 429: slow down"
    });
  });

  it("flags a non-JSON body as malformed", async () => {
    const fetchImpl = fakeFetch(() => textResponse("<html>oops</html>"));
    await expect(requestJson(fetchImpl, "https://example.test/a", {}, options)).rejects.toMatchObject({
      reason: "malformed_response",
      message: "Test API returned a non-JSON body"
    });
  });

  it("wraps transport errors as network_error", async () => {
    const fetchImpl = fakeFetch(() => {
      throw new Error("ECONNRESET");
    });
    await expect(requestJson(fetchImpl, "https://example.test/a", {}, options)).rejects.toMatchObject({
      reason: "network_error",
      message: "Test API request failed: ECONNRESET"
    });
  });

  it("drops the query string from a URL quoted in a transport error", async () => {
    const fetchImpl = fakeFetch(url => {
      throw new Error(`request to ${url} failed, reason: connect ECONNREFUSED 127.0.0.1:1`);
    });
    await expect(
      requestJson(fetchImpl, "http://127.0.0.1:1/api/search?apiKey=test-key", {}, options)
    ).rejects.toMatchObject({
      reason: "network_error",
      message:
        "Test API request failed: request to http://127.0.0.1:1/api/search failed, reason: connect ECONNREFUSED 127.0.0.1:1"
    });
  });

  it("drops query strings echoed back in an error body", async () => {
    const fetchImpl = fakeFetch(() => textResponse("bad call https://example.test/a?apiKey=test-key", 400));
    await expect(requestJson(fetchImpl, "https://example.test/a", {}, options)).rejects.toMatchObject({
      reason: "network_error",
      message: "Test API responded 400: bad call https://example.test/a"
    });
  });

  it("aborts when the timeout elapses", async () => {
    const fetchImpl = fakeFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    await expect(
      requestJson(fetchImpl, "https://example.test/a", {}, { timeoutMs: 20, label: "Test API" })
    ).rejects.toMatchObject({
      reason: "network_error",
      message: "Test API timed out after 20ms"
    });
  });
});

describe("toFailure", () => {
  it("keeps the reason of a ProviderError", () => {
    expect(toFailure(new ProviderError("not_found", "gone"))).toEqual({
      reason: "not_found",
      message: "gone"
    });
  });

  it("treats anything else as a network error", () => {
    expect(toFailure(new Error("boom"))).toEqual({ reason: "network_error", message: "boom" });
    expect(toFailure("boom")).toEqual({ reason: "network_error", message: "boom" });
  });
});

describe("flattenValue", () => {
  it("trims strings", () => {
    expect(flattenValue("  5V ")).toBe("5V");
  });

  it("drops placeholders and empty values", () => {
    expect(flattenValue("-")).toBeNull();
    expect(flattenValue("N/A")).toBeNull();
    expect(flattenValue("")).toBeNull();
    expect(flattenValue(null)).toBeNull();
    expect(flattenValue(undefined)).toBeNull();
  });

  it("stringifies numbers and booleans", () => {
    expect(flattenValue(12)).toBe("12");
    expect(flattenValue(false)).toBe("false");
  });

  it("joins list values", () => {
    expect(flattenValue(["Reel", "-", "Cut Tape"])).toBe("Reel, Cut Tape");
    expect(flattenValue([])).toBeNull();
  });

  it("reads the text field of an object", () => {
    expect(flattenValue({ Id: 3, Value: "Active" })).toBe("Active");
    expect(flattenValue({ Name: "Acme" })).toBe("Acme");
    expect(flattenValue({ Id: 3 })).toBeNull();
  });
});

describe("addAttribute", () => {
  it("keeps the first value for a repeated name", () => {
    const target = new Map<string, string>();
    addAttribute(target, "Packaging", "Reel");
    addAttribute(target, "Packaging", "Cut Tape");
    expect([...target]).toEqual([["Packaging", "Reel"]]);
  });

  it("skips blank names, non-string names and empty values", () => {
    const target = new Map<string, string>();
    addAttribute(target, "  ", "x");
    addAttribute(target, 42, "x");
    addAttribute(target, "Series", "-");
    expect(target.size).toBe(0);
  });
});

describe("redactUrls", () => {
  it("keeps host and path but not query or fragment", () => {
    expect(redactUrls("see https://h.test/p/q?apiKey=test-key&x=1 and http://h.test/r#frag")).toBe(
      "see https://h.test/p/q and http://h.test/r"
    );
  });

  it("leaves text without URLs alone", () => {
    expect(redactUrls("connect ECONNREFUSED 127.0.0.1:1")).toBe("connect ECONNREFUSED 127.0.0.1:1");
  });
});

describe("mpnKey", () => {
  it("ignores punctuation and case", () => {
    expect(mpnKey("xyz-789 ")).toBe("XYZ789");
  });
});
