import { z } from "zod";
import { BackendError, BackendPort, type GenerateRequest } from "../../core/ports/BackendPort";
import { errorMessage } from "../../core/utils/errors";
import { sleep, withRetry } from "../../core/utils/retry";
import { fetchText, safeJson, type FetchLike } from "../http/fetch";

/**
 * Opciones del cliente Ollama.
 */
type OllamaOptions = {
  host: string;             // p.ej. http://localhost:11434 (sin slash final)
  timeoutMs?: number;       // timeout por request, default 30s
  maxRetries?: number;      // reintentos ante red/timeout/429/5xx, default 0
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

const RETRYABLE_STATUS = [429, 500, 502, 503, 504];

const GenerateResponse = z.object({ response: z.string() });
const TagsResponse = z.object({
  models: z.array(z.object({ name: z.string().optional(), model: z.string().optional() })).default([]),
});
const ErrorBody = z.object({ error: z.string() });

/**
 * Cliente HTTP de Ollama (/api/generate, /api/tags).
 * - Timeout explícito por llamada
 * - Retries con backoff exponencial + jitter solo para fallas transitorias
 * - Modelo inexistente (404) u otros 4xx fallan de inmediato
 */
export class OllamaBackend extends BackendPort {
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: OllamaOptions) {
    super();
    this.host = opts.host.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.maxRetries = opts.maxRetries ?? 0;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? sleep;
  }

  async generate(req: GenerateRequest): Promise<string> {
    const payload: Record<string, unknown> = {
      model: req.model,
      prompt: req.prompt,
      stream: false,
      options: {
        temperature: req.options.temperature,
        num_predict: req.options.maxTokens,
      },
    };
    if (req.images && req.images.length > 0) payload.images = req.images;

    const data = await this.request("/api/generate", payload);
    const parsed = GenerateResponse.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(`Respuesta de /api/generate sin 'response' (modelo ${req.model})`, null, false);
    }
    return parsed.data.response;
  }

  async listModels(): Promise<string[]> {
    const data = await this.request("/api/tags");
    const parsed = TagsResponse.safeParse(data);
    if (!parsed.success) throw new BackendError("Respuesta inválida de /api/tags", null, false);
    return parsed.data.models
      .map(m => m.name ?? m.model ?? "")
      .filter(Boolean);
  }

  private request(path: string, body?: unknown): Promise<unknown> {
    return withRetry(() => this.send(path, body), {
      maxRetries: this.maxRetries,
      label: `[OllamaBackend] ${path}`,
      isRetryable: e => e instanceof BackendError && e.retryable,
      sleep: this.sleep,
    });
  }

  private async send(path: string, body: unknown): Promise<unknown> {
    const init: RequestInit =
      body === undefined
        ? { method: "GET" }
        : { method: "POST", headers: { "content-type": "application/json" }, body: JSON.stringify(body) };

    // Red caída o timeout: transitorio
    const res = await fetchText(this.fetchImpl, `${this.host}${path}`, init, this.timeoutMs).catch((e: unknown) => {
      throw new BackendError(`Ollama ${path}: ${errorMessage(e)}`, null, true);
    });

    if (!res.ok) {
      const detail = ErrorBody.safeParse(safeJson(res.body));
      const msg = detail.success ? detail.data.error : res.body.slice(0, 200);
      throw new BackendError(`Ollama ${res.status} en ${path}: ${msg}`, res.status, RETRYABLE_STATUS.includes(res.status));
    }

    const data = safeJson(res.body);
    if (data === undefined) throw new BackendError(`JSON inválido desde ${path}`, res.status, false);
    return data;
  }
}
