export interface SamplingOptions {
  temperature: number;
  maxTokens: number;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  /** Imágenes codificadas en base64 (solo modelos de visión). */
  images?: string[];
  options: SamplingOptions;
}

/**
 * Falla de una llamada al backend de modelos.
 * `status` es null cuando no hubo respuesta HTTP (red, timeout).
 */
export class BackendError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = "BackendError";
  }
}

export abstract class BackendPort {
  /** Devuelve el texto crudo generado por el modelo. */
  abstract generate(req: GenerateRequest): Promise<string>;
  abstract listModels(): Promise<string[]>;
}
