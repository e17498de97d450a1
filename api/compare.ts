import { Router, type Request, type Response } from "express";
import type { BaseMode, LookupResult, ReplacementReport } from "../types.js";
import { isConfigured } from "../backend/services/providerConfig.js";
import { isRecord } from "../backend/services/providerHttp.js";
import { findReplacements } from "../backend/services/replacementSearch.js";
import {
  lookupPart,
  runComparison,
  type PipelineDeps
} from "../backend/services/runComparison.js";

export type CompareRequest = { mpnLeft: string; mpnRight: string };
export type ReplacementRequest = { mpn: string; baseMode: BaseMode; requireResults: boolean };

// The parts of express's req/res the handlers touch.
export interface RouteRequest {
  body?: unknown;
  params?: Record<string, string | undefined>;
}

export interface JsonReply {
  status(code: number): JsonReply;
  json(body: unknown): unknown;
}

const BASE_MODES: readonly BaseMode[] = ["any", "exclude_base", "only_base"];

/**
 * Accepts { mpnLeft, mpnRight } or the form-style { mpn1, mpn2 }.
 */
export function parseCompareRequest(body: unknown): CompareRequest | { error: string } {
  const fields: Record<string, unknown> = isRecord(body) ? body : {};
  const left = pickString(fields.mpnLeft ?? fields.mpn1);
  const right = pickString(fields.mpnRight ?? fields.mpn2);

  if (!left || !right) {
    return { error: "Expected { mpnLeft: string, mpnRight: string }" };
  }
  return { mpnLeft: left, mpnRight: right };
}

export function parseReplacementRequest(body: unknown): ReplacementRequest | { error: string } {
  const fields: Record<string, unknown> = isRecord(body) ? body : {};
  const mpn = pickString(fields.mpn);
  if (!mpn) {
    return { error: "Expected { mpn: string, baseMode?: string }" };
  }

  const baseMode = BASE_MODES.find(mode => mode === (fields.baseMode ?? "any"));
  if (!baseMode) {
    return { error: `baseMode must be one of ${BASE_MODES.join(", ")}` };
  }

  return { mpn, baseMode, requireResults: fields.requireResults !== false };
}

function pickString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function serializeLookup(result: LookupResult) {
  return {
    mpn: result.mpn,
    provider: result.provider,
    failure: result.failure ?? null,
    product: result.product ?? null,
    attempts: result.attempts,
    attributes: [...result.attributes].map(([name, value]) => ({ name, value }))
  };
}

export function serializeReplacements(report: ReplacementReport) {
  if (!report.ok) return report;
  return {
    ...report,
    candidates: report.candidates.map(candidate => ({
      ...candidate,
      attributes: [...candidate.attributes].map(([name, value]) => ({ name, value }))
    }))
  };
}

/* -----------------------------
   Handlers
----------------------------- */

export async function handleCompare(req: RouteRequest, res: JsonReply, deps: PipelineDeps) {
  const parsed = parseCompareRequest(req.body);
  if ("error" in parsed) {
    return res.status(400).json(parsed);
  }

  try {
    const report = await runComparison(parsed, deps);
    return res.json(report);
  } catch (err) {
    console.error("COMPARE ERROR:", err);
    return res.status(500).json({
      error: err instanceof Error ? err.message : "Internal error"
    });
  }
}

export async function handleLookup(req: RouteRequest, res: JsonReply, deps: PipelineDeps) {
  const mpn = (req.params?.mpn ?? "").trim();
  if (!mpn) {
    return res.status(400).json({ error: "Expected an MPN" });
  }

  try {
    const result = await lookupPart(mpn, deps);
    return res.json(serializeLookup(result));
  } catch (err) {
    console.error("LOOKUP ERROR:", err);
    return res.status(500).json({
      error: err instanceof Error ? err.message : "Internal error"
    });
  }
}

export async function handleReplacements(req: RouteRequest, res: JsonReply, deps: PipelineDeps) {
  const parsed = parseReplacementRequest(req.body);
  if ("error" in parsed) {
    return res.status(400).json(parsed);
  }

  try {
    const report = await findReplacements(parsed.mpn, deps, {
      baseMode: parsed.baseMode,
      requireResults: parsed.requireResults
    });
    return res.json(serializeReplacements(report));
  } catch (err) {
    console.error("REPLACEMENTS ERROR:", err);
    return res.status(500).json({
      error: err instanceof Error ? err.message : "Internal error"
    });
  }
}

export function handleHealth(res: JsonReply, deps: PipelineDeps) {
  return res.json({
    ok: true,
    providers: {
      digikey: isConfigured(deps.config, "digikey"),
      mouser: isConfigured(deps.config, "mouser")
    }
  });
}

export function createCompareRouter(deps: PipelineDeps): Router {
  const router = Router();

  router.post("/compare", (req: Request, res: Response) => handleCompare(req, res, deps));
  router.get("/lookup/:mpn", (req: Request, res: Response) => handleLookup(req, res, deps));
  router.post("/replacements", (req: Request, res: Response) => handleReplacements(req, res, deps));
  router.get("/health", (_req: Request, res: Response) => handleHealth(res, deps));

  return router;
}
