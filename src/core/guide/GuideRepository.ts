import { readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import type { ExtractorPort } from "../ports/ExtractorPort";
import { errorMessage } from "../utils/errors";

export type GuideSection = {
  readonly sourceId: string;   // nombre del archivo de origen
  readonly content: string;    // texto transcrito, trim, nunca vacío
};

export const GUIDE_EXTENSIONS: ReadonlySet<string> = new Set([".jpeg", ".jpg", ".png"]);

/**
 * Material de referencia transcrito desde una carpeta de imágenes.
 *
 * La carga ocurre una sola vez por proceso: la primera llamada a `load()`
 * lanza el escaneo y las llamadas concurrentes comparten la misma promesa.
 * El resultado (éxito o fracaso) queda en caché; re-escanear requiere
 * reiniciar el proceso.
 */
export class GuideRepository {
  private _sections: readonly GuideSection[] = [];
  private _loading: Promise<boolean> | null = null;

  constructor(
    private readonly extractor: ExtractorPort,
    private readonly guideDir: string
  ) {}

  load(): Promise<boolean> {
    if (this._loading) return this._loading;
    this._loading = this.scan();
    return this._loading;
  }

  sections(): readonly GuideSection[] {
    return this._sections;
  }

  private async scan(): Promise<boolean> {
    let files: string[];
    try {
      const entries = await readdir(this.guideDir, { withFileTypes: true });
      files = entries
        .filter(e => e.isFile() && GUIDE_EXTENSIONS.has(extname(e.name).toLowerCase()))
        .map(e => e.name)
        .sort();
    } catch (e) {
      console.warn(
        `[GuideRepository] Carpeta de guía no disponible (${this.guideDir}): ${errorMessage(e)}. ` +
          "Se evaluará sin material de referencia."
      );
      return false;
    }

    if (files.length === 0) {
      console.warn(`[GuideRepository] No hay imágenes de guía en ${this.guideDir}`);
      return false;
    }

    console.info(`[GuideRepository] Cargando ${files.length} archivos de guía...`);

    const loaded: GuideSection[] = [];
    for (const name of files) {
      try {
        const text = await this.extractor.extractText(join(this.guideDir, name));
        const content = (text ?? "").trim();
        if (!content) {
          console.warn(`[GuideRepository] Sin texto extraído de ${name}`);
          continue;
        }
        loaded.push(Object.freeze({ sourceId: name, content }));
        console.info(`[GuideRepository] ${name}: ${content.length} caracteres`);
      } catch (e) {
        // Un archivo malo no aborta la ingesta
        console.error(`[GuideRepository] Error procesando ${name}: ${errorMessage(e)}`);
      }
    }

    this._sections = Object.freeze(loaded);

    if (loaded.length === 0) {
      console.warn("[GuideRepository] No se pudo extraer contenido de la guía");
      return false;
    }
    console.info(`[GuideRepository] ${loaded.length} secciones de guía cargadas`);
    return true;
  }
}
