// services/compareAttributes.ts
import type {
  ComparisonReport,
  ComparisonRow,
  LookupResult,
  LookupSummary
} from "../../types.js";

export const ABSENT_DISPLAY = "—";

/** Case-insensitive equality used for the match flag; a doubled space counts as one. */
export function normalizeForMatch(value: string): string {
  return value.trim().toLowerCase().replace(/ {2}/g, " ");
}

/**
 * Row per attribute name: every left name in order, then right-only
 * names in order. Names on one side only never match.
 */
export function compareResults(left: LookupResult, right: LookupResult): ComparisonRow[] {
  const names = [...left.attributes.keys()];
  for (const name of right.attributes.keys()) {
    if (!left.attributes.has(name)) names.push(name);
  }

  return names.map(name => {
    const valueLeft = left.attributes.get(name) ?? null;
    const valueRight = right.attributes.get(name) ?? null;
    return {
      name,
      valueLeft,
      valueRight,
      match:
        valueLeft !== null &&
        valueRight !== null &&
        normalizeForMatch(valueLeft) === normalizeForMatch(valueRight)
    };
  });
}

export function summarizeLookup(result: LookupResult): LookupSummary {
  const summary: LookupSummary = {
    mpn: result.mpn,
    providerUsed: result.provider,
    attributeCount: result.attributes.size
  };
  if (result.failure) {
    summary.failureReason = result.failure.reason;
    summary.failureMessage = result.failure.message;
  }
  if (result.product?.productUrl) {
    summary.productUrl = result.product.productUrl;
  }
  return summary;
}

export function buildComparisonReport(left: LookupResult, right: LookupResult): ComparisonReport {
  return {
    left: summarizeLookup(left),
    right: summarizeLookup(right),
    rows: compareResults(left, right)
  };
}

/* -----------------------------
   Text Rendering (CLI)
----------------------------- */

export function formatComparisonTable(report: ComparisonReport): string {
  const header = ["Parameter", report.left.mpn, report.right.mpn, "Match"];
  const body = report.rows.map(row => [
    row.name,
    row.valueLeft ?? ABSENT_DISPLAY,
    row.valueRight ?? ABSENT_DISPLAY,
    row.match ? "✓" : ""
  ]);

  const widths = header.map((h, i) =>
    Math.max(h.length, ...body.map(cells => cells[i].length))
  );
  const line = (cells: string[]) =>
    cells.map((c, i) => c.padEnd(widths[i])).join(" | ").trimEnd();

  const lines = [
    `${report.left.mpn}: ${describeSide(report.left)}`,
    `${report.right.mpn}: ${describeSide(report.right)}`,
    "",
    line(header),
    widths.map(w => "-".repeat(w)).join("-+-"),
    ...body.map(line)
  ];
  return lines.join("\n");
}

function describeSide(summary: LookupSummary): string {
  if (summary.providerUsed) {
    return `${summary.attributeCount} attributes from ${summary.providerUsed}`;
  }
  return `no attributes (${summary.failureReason ?? "unknown"}: ${summary.failureMessage ?? ""})`;
}
