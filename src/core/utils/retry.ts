// src/core/utils/retry.ts
// Reintentos con backoff exponencial + jitter, compartidos por las llamadas al backend.

export type RetryOptions = {
  /** Reintentos adicionales tras el primer intento (0 = un solo intento). */
  maxRetries: number;
  /** Prefijo para logs, p.ej. "[OllamaBackend] /api/generate" */
  label: string;
  /** Decide si el error amerita otro intento. */
  isRetryable: (e: unknown) => boolean;
  /** Inyectable en tests para no esperar de verdad. */
  sleep?: (ms: number) => Promise<void>;
};

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const wait = opts.sleep ?? sleep;
  const max = Math.max(0, Math.floor(opts.maxRetries));

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= max || !opts.isRetryable(e)) throw e;
      const b = backoffMs(attempt);
      console.warn(`${opts.label} falla transitoria (${describe(e)}); reintento en ${b}ms.`);
      await wait(b);
    }
  }
}

export function backoffMs(attempt: number): number {
  const base = 300; // ms
  const factor = 2 ** attempt;
  const jitter = Math.floor(Math.random() * 200);
  return base * factor + jitter;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function describe(e: unknown): string {
  if (e instanceof Error) return e.name === "Error" ? e.message : `${e.name}: ${e.message}`;
  return String(e);
}
