// src/core/guide/relevance.ts
// Selección de contexto por solapamiento literal de palabras (sin stemming ni sinónimos).

import type { GuideSection } from "./GuideRepository";

export const NO_GUIDE_CONTEXT = "No reference guide available.";

export const DEFAULT_MAX_SECTIONS = 2;
export const SECTION_CHAR_LIMIT = 800;
export const DEFAULT_SECTION_CHAR_LIMIT = 1000;

// Palabras funcionales que no aportan al solapamiento (solo del lado de la respuesta)
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with", "by",
  "is", "are", "was", "were", "be", "been", "have", "has", "had", "do", "does", "did",
  "will", "would", "could", "should", "may", "might", "can", "this", "that", "these", "those",
]);

export type ScoredSection = {
  section: GuideSection;
  overlap: number;
};

export function tokenSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

export function answerKeywords(answerText: string): Set<string> {
  const out = tokenSet(answerText);
  for (const w of STOP_WORDS) out.delete(w);
  return out;
}

export function overlapCount(keywords: ReadonlySet<string>, tokens: ReadonlySet<string>): number {
  let n = 0;
  for (const w of keywords) if (tokens.has(w)) n++;
  return n;
}

/**
 * Secciones con solapamiento > 0, de mayor a menor.
 * Empates conservan el orden de ingesta (sort estable).
 */
export function rankSections(sections: readonly GuideSection[], answerText: string): ScoredSection[] {
  const keywords = answerKeywords(answerText);
  return sections
    .map(section => ({ section, overlap: overlapCount(keywords, tokenSet(section.content)) }))
    .filter(s => s.overlap > 0)
    .sort((a, b) => b.overlap - a.overlap);
}

export function selectContext(
  sections: readonly GuideSection[],
  answerText: string,
  maxSections = DEFAULT_MAX_SECTIONS
): string {
  const first = sections[0];
  if (!first) return NO_GUIDE_CONTEXT;

  const ranked = rankSections(sections, answerText);
  if (ranked.length === 0) {
    return `Reference Guide (${first.sourceId}):\n${first.content.slice(0, DEFAULT_SECTION_CHAR_LIMIT)}...`;
  }

  return ranked
    .slice(0, Math.max(1, maxSections))
    .map(({ section, overlap }) =>
      `Guide ${section.sourceId} (relevance: ${overlap}):\n${section.content.slice(0, SECTION_CHAR_LIMIT)}`
    )
    .join("\n\n");
}
