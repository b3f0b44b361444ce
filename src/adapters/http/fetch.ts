export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type RawResponse = {
  ok: boolean;
  status: number;
  body: string;
};

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * fetch + lectura del body bajo un mismo timeout (AbortController).
 * Lanza `TimeoutError` si se vence el plazo; otros errores de red se propagan.
 */
async function withTimeout<T>(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const tid = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    return await read(res);
  } catch (e) {
    if (controller.signal.aborted) throw new TimeoutError(`timeout tras ${timeoutMs}ms: ${redact(url)}`);
    throw e;
  } finally {
    clearTimeout(tid);
  }
}

export function fetchText(fetchImpl: FetchLike, url: string, init: RequestInit, timeoutMs: number): Promise<RawResponse> {
  return withTimeout(fetchImpl, url, init, timeoutMs, async (res) => ({
    ok: res.ok,
    status: res.status,
    body: await res.text(),
  }));
}

export function fetchBytes(fetchImpl: FetchLike, url: string, timeoutMs: number): Promise<Buffer> {
  return withTimeout(fetchImpl, url, { method: "GET" }, timeoutMs, async (res) => {
    if (!res.ok) throw new Error(`HTTP ${res.status} descargando ${redact(url)}`);
    return Buffer.from(await res.arrayBuffer());
  });
}

// El token del bot viaja en la URL de Telegram: nunca a los logs
export function redact(url: string): string {
  return url.replace(/\/bot[^/]+\//, "/bot<token>/");
}

export function safeJson(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}
