// src/core/messages/analysis.ts
// Análisis liviano de cada mensaje recibido: keywords resaltadas, menciones, hashtags y URLs.

export type MessageAnalysis = {
  isHighlighted: boolean;
  mentions: string[];
  hashtags: string[];
  urls: string[];
  wordCount: number;
  charCount: number;
  hasSpecialContent: boolean;
};

const URL_RE = /https?:\/\/[^\s<>"']+/g;

export function extractMentions(text: string): string[] {
  return Array.from(text.matchAll(/@(\w+)/g), m => m[1] ?? "").filter(Boolean);
}

export function extractHashtags(text: string): string[] {
  return Array.from(text.matchAll(/#(\w+)/g), m => m[1] ?? "").filter(Boolean);
}

export function extractUrls(text: string): string[] {
  return text.match(URL_RE) ?? [];
}

export class MessageAnalyzer {
  private readonly keywords: string[];

  constructor(keywords: readonly string[] = []) {
    this.keywords = keywords.map(k => k.trim().toLowerCase()).filter(Boolean);
  }

  isHighlighted(text: string): boolean {
    if (this.keywords.length === 0) return false;
    const lower = text.toLowerCase();
    return this.keywords.some(k => lower.includes(k));
  }

  analyze(text: string): MessageAnalysis {
    const mentions = extractMentions(text);
    const hashtags = extractHashtags(text);
    const urls = extractUrls(text);
    const trimmed = text.trim();
    return {
      isHighlighted: this.isHighlighted(text),
      mentions,
      hashtags,
      urls,
      wordCount: trimmed ? trimmed.split(/\s+/).length : 0,
      charCount: text.length,
      hasSpecialContent: mentions.length > 0 || hashtags.length > 0 || urls.length > 0,
    };
  }
}
