import { err, ok, type Result } from "../types/Result";
import { isRecord } from "../utils/errors";
import { MAX_SCORE, MIN_SCORE, type EvaluationResult, type ParseFailure } from "./types";

/**
 * Interpreta la salida cruda del modelo como `{ score, reason }`.
 * Tolera prosa alrededor: toma desde la primera `{` hasta la última `}`.
 */
export function parseEvaluation(raw: string): Result<EvaluationResult, ParseFailure> {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end < 0) return err("no_json");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return err("invalid_json");
  }

  if (!isRecord(parsed) || !("score" in parsed) || !("reason" in parsed)) {
    return err("missing_keys");
  }

  const score = coerceInteger(parsed.score);
  if (score === null) return err("non_numeric_score");
  if (score < MIN_SCORE || score > MAX_SCORE) return err("score_out_of_range");

  const reason = typeof parsed.reason === "string" ? parsed.reason : JSON.stringify(parsed.reason);
  return ok({ score, reason: reason.trim() });
}

/** Números se truncan hacia cero; strings solo si son enteros ("4", " 3 "). */
export function coerceInteger(value: unknown): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return Math.trunc(value) + 0; // normaliza -0
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10) + 0;
  }
  return null;
}
