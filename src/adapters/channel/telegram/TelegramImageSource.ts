import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { ImageSourcePort } from "../../../core/ports/ImageSourcePort";
import { errorMessage } from "../../../core/utils/errors";
import type { TelegramBotApi } from "./TelegramBotApi";

/**
 * Descarga los archivos de Telegram a un directorio temporal propio.
 */
export class TelegramImageSource extends ImageSourcePort {
  constructor(
    private readonly api: TelegramBotApi,
    private readonly tempDir: string
  ) {
    super();
  }

  async download(fileId: string): Promise<string | null> {
    try {
      const filePath = await this.api.getFile(fileId);
      if (!filePath) {
        console.warn(`[TelegramImageSource] getFile sin file_path para ${fileId}`);
        return null;
      }

      const bytes = await this.api.downloadFile(filePath);
      await mkdir(this.tempDir, { recursive: true });
      const local = join(this.tempDir, `${safeName(fileId)}.${fileExtension(filePath)}`);
      await writeFile(local, bytes);
      console.info(`[TelegramImageSource] Descargado: ${local}`);
      return local;
    } catch (e) {
      console.error(`[TelegramImageSource] Descarga fallida (${fileId}): ${errorMessage(e)}`);
      return null;
    }
  }

  async discard(localPath: string): Promise<void> {
    try {
      await rm(localPath, { force: true });
    } catch (e) {
      console.warn(`[TelegramImageSource] No se pudo borrar ${localPath}: ${errorMessage(e)}`);
    }
  }

  async cleanup(): Promise<void> {
    let names: string[];
    try {
      const entries = await readdir(this.tempDir, { withFileTypes: true });
      names = entries.filter(e => e.isFile()).map(e => e.name);
    } catch {
      return; // sin directorio, nada que limpiar
    }
    for (const name of names) await this.discard(join(this.tempDir, name));
  }
}

export function fileExtension(filePath: string): string {
  const ext = extname(filePath).slice(1);
  return ext || "jpg";
}

function safeName(fileId: string): string {
  return fileId.replace(/[^A-Za-z0-9_-]/g, "_");
}
