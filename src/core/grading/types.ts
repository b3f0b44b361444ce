export const MIN_SCORE = 0;
export const MAX_SCORE = 5;

export interface EvaluationResult {
  score: number;   // entero en [0, 5]
  reason: string;
}

export const NO_ANSWER_RESULT: EvaluationResult = Object.freeze({
  score: 0,
  reason: "No answer provided",
});

export const TECHNICAL_ERROR_RESULT: EvaluationResult = Object.freeze({
  score: 0,
  reason: "Unable to evaluate answer due to technical error",
});

export type ParseFailure =
  | "no_json"
  | "invalid_json"
  | "missing_keys"
  | "non_numeric_score"
  | "score_out_of_range";

export type CandidateFailure = {
  model: string;
  reason: ParseFailure | "backend_error";
  detail: string;
};

export type EvaluationSource = "model" | "fallback" | "empty" | "error";

export interface EvaluationOutcome {
  result: EvaluationResult;
  source: EvaluationSource;
  /** Modelo que produjo el puntaje; null si no fue un modelo. */
  model: string | null;
  failures: CandidateFailure[];
}
