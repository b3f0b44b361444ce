import { DEFAULTS } from "./defaults";

export interface AppConfig {
  telegramToken: string;
  ollamaHost: string;
  ollamaModel: string;
  ollamaTimeoutMs: number;
  ollamaMaxRetries: number;
  graderModels: string[];
  guideDir: string;
  messageLogUrl: string;
  pollTimeoutSec: number;
  tempDir: string;
  highlightKeywords: string[];
  // Opcional: solo se agrega si existe (no se asigna undefined)
  messageLogAuthToken?: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const telegramToken = must(env, "TELEGRAM_BOT_TOKEN");

  const cfg: AppConfig = {
    telegramToken,
    ollamaHost: (env.OLLAMA_HOST || DEFAULTS.OLLAMA_HOST).replace(/\/+$/, ""),
    ollamaModel: env.OLLAMA_MODEL || DEFAULTS.OLLAMA_MODEL,
    ollamaTimeoutMs: intOr(env.OLLAMA_TIMEOUT_MS, DEFAULTS.OLLAMA_TIMEOUT_MS),
    ollamaMaxRetries: intOr(env.OLLAMA_MAX_RETRIES, DEFAULTS.OLLAMA_MAX_RETRIES),
    graderModels: env.GRADER_MODELS ? splitList(env.GRADER_MODELS) : [...DEFAULTS.GRADER_MODELS],
    guideDir: env.GUIDE_DIR || DEFAULTS.GUIDE_DIR,
    messageLogUrl: env.MESSAGE_LOG_URL || DEFAULTS.MESSAGE_LOG_URL,
    pollTimeoutSec: intOr(env.POLL_TIMEOUT_SEC, DEFAULTS.POLL_TIMEOUT_SEC),
    tempDir: env.TEMP_DIR || DEFAULTS.TEMP_DIR,
    highlightKeywords: splitList(env.HIGHLIGHT_KEYWORDS ?? "").map(k => k.toLowerCase()),
  };

  if (env.MESSAGE_LOG_AUTH_TOKEN) cfg.messageLogAuthToken = env.MESSAGE_LOG_AUTH_TOKEN;

  return cfg;
}

function must(env: Env, k: string): string {
  const v = env[k];
  if (v == null || v === "") throw new Error(`Missing environment variable: ${k}`);
  return v;
}

function intOr(raw: string | undefined, def: number): number {
  const n = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(n) && n >= 0 ? n : def;
}

function splitList(raw: string): string[] {
  return raw.split(",").map(s => s.trim()).filter(Boolean);
}
