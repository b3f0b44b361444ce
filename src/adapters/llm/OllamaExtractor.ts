import { readFile } from "node:fs/promises";
import type { BackendPort } from "../../core/ports/BackendPort";
import { ExtractorPort } from "../../core/ports/ExtractorPort";
import { errorMessage } from "../../core/utils/errors";

export const TRANSCRIBE_PROMPT = `Read ALL text in this image. Extract every word, number, and character visible.

READ EVERYTHING:
- All handwritten text (cursive, print, notes)
- All printed text (documents, books, signs)
- All digital text (screens, apps)
- Numbers, dates, addresses, phone numbers
- Equations, formulas, symbols
- Faded text, partial text, crossed-out text
- Text at any angle or size

RULES:
- Don't skip anything
- Keep exact spelling and punctuation
- Don't interpret or correct
- Transcribe exactly what you see

OUTPUT: Only the actual text content.`;

// Fragmentos de nombre que identifican modelos con visión
export const VISION_MODEL_HINTS = ["llava", "vision", "minicpm", "visual"] as const;
export const PREFERRED_VISION_FAMILY = "minicpm";
// Se prueban uno a uno si /api/tags no muestra ningún modelo de visión
export const KNOWN_VISION_MODELS = ["llava:latest", "minicpm-v:latest", "llava", "minicpm-v"] as const;

type ReadImage = (path: string) => Promise<Buffer>;

/**
 * OCR vía modelo de visión local.
 * Antes del primer uso elige el modelo (probe); `extractText` nunca lanza.
 */
export class OllamaExtractor extends ExtractorPort {
  private model: string;
  private probing: Promise<boolean> | null = null;

  constructor(
    private readonly backend: BackendPort,
    preferredModel: string,
    private readonly readImage: ReadImage = (p) => readFile(p)
  ) {
    super();
    this.model = preferredModel;
  }

  currentModel(): string {
    return this.model;
  }

  /** Probe único por instancia; llamadas concurrentes comparten la promesa. */
  ensureProbed(): Promise<boolean> {
    if (this.probing) return this.probing;
    this.probing = this.probe();
    return this.probing;
  }

  async extractText(imagePath: string): Promise<string | null> {
    try {
      await this.ensureProbed();
      const image = (await this.readImage(imagePath)).toString("base64");
      const raw = await this.backend.generate({
        model: this.model,
        prompt: TRANSCRIBE_PROMPT,
        images: [image],
        options: { temperature: 0.1, maxTokens: 2048 },
      });
      const text = raw.trim();
      console.info(`[OllamaExtractor] ${text.length} caracteres extraídos de ${imagePath}`);
      return text;
    } catch (e) {
      console.error(`[OllamaExtractor] Extracción fallida (${imagePath}): ${errorMessage(e)}`);
      return null;
    }
  }

  private async probe(): Promise<boolean> {
    let available: string[];
    try {
      available = await this.backend.listModels();
    } catch (e) {
      console.error(`[OllamaExtractor] No se pudo conectar con Ollama: ${errorMessage(e)}`);
      return false;
    }

    const vision = available.filter(m => VISION_MODEL_HINTS.some(h => m.toLowerCase().includes(h)));
    const chosen = vision.find(m => m.toLowerCase().includes(PREFERRED_VISION_FAMILY)) ?? vision[0];
    if (chosen) {
      this.model = chosen;
      console.info(`[OllamaExtractor] Usando modelo: ${chosen}`);
      return true;
    }

    // Ningún nombre conocido en la lista: se prueba generar 1 token con cada candidato
    const candidates = [this.model, ...KNOWN_VISION_MODELS].filter((m, i, all) => all.indexOf(m) === i);
    for (const candidate of candidates) {
      try {
        await this.backend.generate({
          model: candidate,
          prompt: "test",
          options: { temperature: 0, maxTokens: 1 },
        });
        this.model = candidate;
        console.info(`[OllamaExtractor] Usando modelo: ${candidate}`);
        return true;
      } catch (e) {
        console.warn(`[OllamaExtractor] Modelo ${candidate} no disponible: ${errorMessage(e)}`);
      }
    }

    console.error("[OllamaExtractor] No hay modelo de visión disponible");
    return false;
  }
}
