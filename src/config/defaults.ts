import { tmpdir } from "node:os";
import { join } from "node:path";

export const DEFAULTS = {
  OLLAMA_HOST: "http://localhost:11434",
  // Modelo de visión preferido para transcribir imágenes
  OLLAMA_MODEL: "minicpm-v:latest",
  OLLAMA_TIMEOUT_MS: 30_000,
  OLLAMA_MAX_RETRIES: 0,
  // Candidatos de texto para calificar, del más liviano al más pesado.
  // El modelo de visión se agrega al final en tiempo de ejecución.
  GRADER_MODELS: ["llama3.2:3b", "mistral:7b-instruct", "llama2:latest"],
  GUIDE_DIR: "guide",
  MESSAGE_LOG_URL: "file:messages.db",
  POLL_TIMEOUT_SEC: 30,
  TEMP_DIR: join(tmpdir(), "telegram_images"),
} as const;
