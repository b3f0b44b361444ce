import type { Client } from "@libsql/client";
import type { AppConfig } from "./config";
import { createDb } from "./db/db";
import { OllamaBackend } from "./adapters/llm/OllamaBackend";
import { OllamaExtractor } from "./adapters/llm/OllamaExtractor";
import { LibsqlMessageLog } from "./adapters/repo/LibsqlMessageLog";
import { TelegramBotApi } from "./adapters/channel/telegram/TelegramBotApi";
import { TelegramHttpNotifier } from "./adapters/channel/telegram/TelegramHttpNotifier";
import { TelegramImageSource } from "./adapters/channel/telegram/TelegramImageSource";
import { TelegramAdapter } from "./adapters/channel/telegram/TelegramAdapter";
import { GuideRepository } from "./core/guide/GuideRepository";
import { GradingEngine } from "./core/grading/GradingEngine";
import { AnswerPipeline } from "./core/pipeline/AnswerPipeline";
import { MessageAnalyzer } from "./core/messages/analysis";

export interface App {
  db: Client;
  api: TelegramBotApi;
  extractor: OllamaExtractor;
  guide: GuideRepository;
  images: TelegramImageSource;
  adapter: TelegramAdapter;
}

/** Arma el grafo de dependencias a partir de la configuración. Sin singletons de módulo. */
export function createApp(cfg: AppConfig): App {
  const db = createDb(cfg.messageLogUrl, cfg.messageLogAuthToken);
  const api = new TelegramBotApi(cfg.telegramToken);
  const backend = new OllamaBackend({
    host: cfg.ollamaHost,
    timeoutMs: cfg.ollamaTimeoutMs,
    maxRetries: cfg.ollamaMaxRetries,
  });

  const extractor = new OllamaExtractor(backend, cfg.ollamaModel);
  const guide = new GuideRepository(extractor, cfg.guideDir);
  const grader = new GradingEngine(backend, guide, extractor, { candidateModels: cfg.graderModels });

  const notifier = new TelegramHttpNotifier(api);
  const images = new TelegramImageSource(api, cfg.tempDir);
  const pipeline = new AnswerPipeline(images, extractor, grader, notifier);
  const adapter = new TelegramAdapter(
    new LibsqlMessageLog(db),
    notifier,
    pipeline,
    new MessageAnalyzer(cfg.highlightKeywords)
  );

  return { db, api, extractor, guide, images, adapter };
}
