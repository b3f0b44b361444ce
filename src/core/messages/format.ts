import type { EvaluationResult } from "../grading/types";

export function formatEvaluation(result: EvaluationResult): string {
  return `📝 ANSWER EVALUATION:\n\n🎯 Score: ${result.score}/5\n💭 Feedback: ${result.reason}`;
}

export function formatProcessingError(kind: "photo" | "document", e: unknown): string {
  const what = kind === "document" ? "document image" : "image";
  const detail = (e instanceof Error ? e.message : String(e)).slice(0, 100);
  return `❌ Error processing ${what}: ${detail}...\nPlease check if Ollama is running.`;
}
