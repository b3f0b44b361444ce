export abstract class ExtractorPort {
  /** Texto transcrito (trim) o null ante cualquier falla. */
  abstract extractText(imagePath: string): Promise<string | null>;
  /** Modelo de visión seleccionado actualmente. */
  abstract currentModel(): string;
}
