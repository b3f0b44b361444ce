import type { BackendPort } from "../ports/BackendPort";
import type { ExtractorPort } from "../ports/ExtractorPort";
import type { GuideRepository } from "../guide/GuideRepository";
import { DEFAULT_MAX_SECTIONS, selectContext } from "../guide/relevance";
import { err, type Result } from "../types/Result";
import { errorMessage } from "../utils/errors";
import { fallbackEvaluation } from "./fallback";
import { parseEvaluation } from "./parse";
import { buildEvaluationPrompt } from "./prompt";
import {
  NO_ANSWER_RESULT,
  TECHNICAL_ERROR_RESULT,
  type CandidateFailure,
  type EvaluationOutcome,
  type EvaluationResult,
} from "./types";

export type GradingOptions = {
  /** Modelos de texto en orden de preferencia. El de visión se agrega al final. */
  candidateModels: readonly string[];
  /** Default: 0.2 (casi determinista) */
  temperature?: number;
  /** Default: 200 tokens, suficiente para el JSON */
  maxTokens?: number;
  /** Default: 2 secciones de guía en el contexto */
  maxSections?: number;
};

/**
 * Califica una respuesta de 0 a 5 contra la guía de referencia.
 *
 * Prueba los modelos candidatos en orden; el primero que devuelve un JSON
 * válido gana. Si todos fallan se usa la heurística por cantidad de palabras.
 * `evaluate` nunca rechaza: cualquier error inesperado se convierte en el
 * resultado fijo de error técnico.
 */
export class GradingEngine {
  constructor(
    private readonly backend: BackendPort,
    private readonly guide: GuideRepository,
    private readonly extractor: ExtractorPort,
    private readonly opts: GradingOptions
  ) {}

  async evaluate(answerText: string | null): Promise<EvaluationResult> {
    const outcome = await this.evaluateDetailed(answerText);
    return outcome.result;
  }

  async evaluateDetailed(answerText: string | null): Promise<EvaluationOutcome> {
    const failures: CandidateFailure[] = [];
    try {
      const answer = (answerText ?? "").trim();
      if (!answer) {
        return { result: { ...NO_ANSWER_RESULT }, source: "empty", model: null, failures };
      }

      // load() es single-flight: una evaluación concurrente espera la misma carga.
      // Se sigue aunque falle.
      await this.guide.load();

      const context = selectContext(this.guide.sections(), answer, this.opts.maxSections ?? DEFAULT_MAX_SECTIONS);
      const prompt = buildEvaluationPrompt(context, answer);

      for (const model of this.candidates()) {
        const attempt = await this.tryCandidate(model, prompt);
        if (attempt.ok) {
          console.info(`[GradingEngine] Evaluación exitosa con ${model}: ${attempt.value.score}/5`);
          return { result: attempt.value, source: "model", model, failures };
        }
        failures.push(attempt.error);
        console.warn(`[GradingEngine] Candidato ${model} descartado (${attempt.error.reason}): ${attempt.error.detail}`);
      }

      console.warn("[GradingEngine] Todos los modelos fallaron, se usa puntaje heurístico");
      return { result: fallbackEvaluation(answer), source: "fallback", model: null, failures };
    } catch (e) {
      console.error(`[GradingEngine] Error inesperado evaluando respuesta: ${errorMessage(e)}`);
      return { result: { ...TECHNICAL_ERROR_RESULT }, source: "error", model: null, failures };
    }
  }

  /** Candidatos sin duplicados, con el modelo de visión como último recurso. */
  candidates(): string[] {
    const out: string[] = [];
    for (const m of [...this.opts.candidateModels, this.extractor.currentModel()]) {
      if (m && !out.includes(m)) out.push(m);
    }
    return out;
  }

  private async tryCandidate(model: string, prompt: string): Promise<Result<EvaluationResult, CandidateFailure>> {
    let raw: string;
    try {
      raw = await this.backend.generate({
        model,
        prompt,
        options: {
          temperature: this.opts.temperature ?? 0.2,
          maxTokens: this.opts.maxTokens ?? 200,
        },
      });
    } catch (e) {
      return err({ model, reason: "backend_error", detail: errorMessage(e) });
    }

    console.info(`[GradingEngine] Respuesta cruda de ${model}: ${raw.trim().slice(0, 300)}`);
    const parsed = parseEvaluation(raw);
    if (parsed.ok) return parsed;
    return err({ model, reason: parsed.error, detail: raw.trim().slice(0, 120) });
  }
}
