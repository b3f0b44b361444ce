import { describe, it, expect } from "vitest";
import { coerceInteger, parseEvaluation } from "./parse";

describe("parseEvaluation", () => {
  it("accepts a bare JSON object", () => {
    expect(parseEvaluation('{"score": 4, "reason": "Mentions light and chlorophyll"}')).toEqual({
      ok: true,
      value: { score: 4, reason: "Mentions light and chlorophyll" },
    });
  });

  it("tolerates prose and code fences around the object", () => {
    const raw = 'Here is my evaluation:\n```json\n{"score": 3, "reason": "  Partially correct "}\n```\nThanks';
    expect(parseEvaluation(raw)).toEqual({ ok: true, value: { score: 3, reason: "Partially correct" } });
  });

  it("coerces numeric strings and truncates floats", () => {
    expect(parseEvaluation('{"score": "5", "reason": "ok"}')).toEqual({ ok: true, value: { score: 5, reason: "ok" } });
    expect(parseEvaluation('{"score": 3.9, "reason": "ok"}')).toEqual({ ok: true, value: { score: 3, reason: "ok" } });
  });

  it("stringifies a non-string reason", () => {
    expect(parseEvaluation('{"score": 2, "reason": ["vague", "short"]}')).toEqual({
      ok: true,
      value: { score: 2, reason: '["vague","short"]' },
    });
  });

  it.each([
    ["no braces at all", "no_json"],
    ["only an opening { brace", "no_json"],
    ["{score: 4, reason: 'single quotes'}", "invalid_json"],
    ['{"score": 4}', "missing_keys"],
    ['{"reason": "no score"}', "missing_keys"],
    ['{"score": "four", "reason": "x"}', "non_numeric_score"],
    ['{"score": null, "reason": "x"}', "non_numeric_score"],
    ['{"score": "4.5", "reason": "x"}', "non_numeric_score"],
    ['{"score": 7, "reason": "too generous"}', "score_out_of_range"],
    ['{"score": -1, "reason": "negative"}', "score_out_of_range"],
  ])("rejects %s as %s", (raw, reason) => {
    expect(parseEvaluation(raw)).toEqual({ ok: false, error: reason });
  });
});

describe("coerceInteger", () => {
  it("normalizes negative zero", () => {
    expect(Object.is(coerceInteger(-0.4), 0)).toBe(true);
    expect(Object.is(coerceInteger("-0"), 0)).toBe(true);
  });

  it("rejects non-finite numbers and booleans", () => {
    expect(coerceInteger(Number.POSITIVE_INFINITY)).toBeNull();
    expect(coerceInteger(Number.NaN)).toBeNull();
    expect(coerceInteger(true)).toBeNull();
  });

  it("accepts padded integer strings", () => {
    expect(coerceInteger(" 3 ")).toBe(3);
    expect(coerceInteger("+2")).toBe(2);
  });
});
