import { z } from "zod";
import { fetchBytes, fetchText, safeJson, type FetchLike } from "../../http/fetch";

const Envelope = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const FileResult = z.object({ file_id: z.string(), file_path: z.string().optional() });

/**
 * Cliente mínimo del Telegram Bot API (HTTP directo).
 */
export class TelegramBotApi {
  private readonly base: string;
  private readonly fileBase: string;

  constructor(
    token: string,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly timeoutMs = 30_000
  ) {
    if (!token) throw new Error("Telegram token required");
    this.base = `https://api.telegram.org/bot${token}`;
    this.fileBase = `https://api.telegram.org/file/bot${token}`;
  }

  // ---- API core ----
  async call(method: string, payload: Record<string, unknown>, timeoutMs = this.timeoutMs): Promise<unknown> {
    const res = await fetchText(
      this.fetchImpl,
      `${this.base}/${method}`,
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      },
      timeoutMs
    );

    const env = Envelope.safeParse(safeJson(res.body));
    if (!res.ok || !env.success || !env.data.ok) {
      const why = env.success ? env.data.description ?? "" : res.body.slice(0, 500);
      throw new Error(`Telegram ${method} ${res.status}: ${why}`);
    }
    return env.data.result;
  }

  /** Long polling; el timeout HTTP deja margen sobre el del servidor. */
  async getUpdates(offset: number | null, timeoutSec: number): Promise<unknown[]> {
    const payload: Record<string, unknown> = { timeout: timeoutSec, allowed_updates: ["message"] };
    if (offset !== null) payload.offset = offset;
    const result = await this.call("getUpdates", payload, (timeoutSec + 10) * 1000);
    return Array.isArray(result) ? result : [];
  }

  async getFile(fileId: string): Promise<string | null> {
    const result = FileResult.safeParse(await this.call("getFile", { file_id: fileId }));
    return result.success ? result.data.file_path ?? null : null;
  }

  async downloadFile(filePath: string): Promise<Buffer> {
    // Un Bot API local puede devolver la URL absoluta
    const url = filePath.startsWith("https://")
      ? filePath
      : `${this.fileBase}/${filePath.replace(/^\/+/, "")}`;
    return fetchBytes(this.fetchImpl, url, this.timeoutMs);
  }
}
