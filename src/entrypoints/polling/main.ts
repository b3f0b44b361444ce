import "dotenv/config";
import { loadConfig } from "../../config";
import { createApp } from "../../app";
import { migrateOnce } from "../../db/migrate";
import { errorMessage, isRecord } from "../../core/utils/errors";
import { backoffMs, sleep } from "../../core/utils/retry";

async function main(): Promise<void> {
  const cfg = loadConfig();
  const app = createApp(cfg);

  await migrateOnce(app.db);
  console.info("[polling] Esquema listo");

  // OCR solo si hay un modelo de visión disponible
  const visionReady = await app.extractor.ensureProbed();
  app.adapter.setImageProcessing(visionReady);
  if (visionReady) {
    console.info(`[polling] Ollama listo (${app.extractor.currentModel()}); cargando guía...`);
    const loaded = await app.guide.load();
    console.info(`[polling] Guía: ${loaded ? `${app.guide.sections().length} secciones` : "no disponible"}`);
  } else {
    console.warn("[polling] Ollama no disponible: procesamiento de imágenes deshabilitado");
  }

  let running = true;
  const inflight = new Set<Promise<void>>();

  const stop = (signal: string) => {
    if (!running) return;
    console.info(`[polling] ${signal} recibido, deteniendo...`);
    running = false;
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  let offset: number | null = null;
  let failures = 0;
  console.info("[polling] Bot iniciado");

  while (running) {
    let updates: unknown[];
    try {
      updates = await app.api.getUpdates(offset, cfg.pollTimeoutSec);
      failures = 0;
    } catch (e) {
      console.error(`[polling] getUpdates falló: ${errorMessage(e)}`);
      await sleep(backoffMs(Math.min(failures++, 6)));
      continue;
    }

    for (const u of updates) {
      const id = isRecord(u) && typeof u.update_id === "number" ? u.update_id : null;
      if (id !== null) offset = Math.max(offset ?? 0, id + 1);

      // No bloquea el loop: cada update maneja y registra sus propios errores
      const task = app.adapter
        .handleUpdate(u)
        .then(() => undefined)
        .catch((e: unknown) => console.error(`[polling] Error procesando update ${id ?? "?"}: ${errorMessage(e)}`));
      inflight.add(task);
      void task.finally(() => inflight.delete(task));
    }
  }

  await Promise.allSettled(inflight);
  await app.images.cleanup();
  app.db.close();
  console.info("[polling] Detenido");
}

main().catch((e: unknown) => {
  console.error(`[polling] Error fatal: ${errorMessage(e)}`);
  process.exitCode = 1;
});
