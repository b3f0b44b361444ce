import type { EvaluationResult } from "./types";

export function countWords(text: string): number {
  const t = text.trim();
  return t ? t.split(/\s+/).length : 0;
}

/** Puntaje determinista por longitud, usado cuando ningún modelo respondió bien. */
export function fallbackEvaluation(answerText: string): EvaluationResult {
  const words = countWords(answerText);
  if (words < 10) return { score: 1, reason: "Answer too short for a 5-mark question" };
  if (words < 30) return { score: 2, reason: "Brief answer, may lack detail" };
  if (words < 60) return { score: 3, reason: "Adequate length, content evaluation needed" };
  return { score: 4, reason: "Good length, appears comprehensive" };
}
