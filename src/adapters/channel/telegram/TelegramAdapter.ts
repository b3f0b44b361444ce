// adapters/channel/telegram/TelegramAdapter.ts
import type { MessageLogPort } from "../../../core/ports/MessageLogPort";
import type { NotifierPort } from "../../../core/ports/NotifierPort";
import type { AnswerPipeline, PipelineOutcome } from "../../../core/pipeline/AnswerPipeline";
import type { MessageAnalyzer } from "../../../core/messages/analysis";
import type { NormalizedMessage } from "../../../core/types/NormalizedMessage";
import { replies } from "../../../core/messages/replies";
import { errorMessage } from "../../../core/utils/errors";
import { normalizeUpdate } from "./normalize";

// Solo se necesita el punto de entrada de imágenes del pipeline
export type ImageHandler = Pick<AnswerPipeline, "handleImage">;

export type HandledUpdate =
  | { kind: "ignored" }
  | { kind: "logged"; message: NormalizedMessage }
  | { kind: "command"; message: NormalizedMessage; command: string }
  | { kind: "image"; message: NormalizedMessage; outcome: PipelineOutcome };

export class TelegramAdapter {
  private imageProcessing = false;

  constructor(
    private readonly log: MessageLogPort,
    private readonly notifier: NotifierPort,
    private readonly pipeline: ImageHandler,
    private readonly analyzer: MessageAnalyzer
  ) {}

  setImageProcessing(enabled: boolean): void {
    this.imageProcessing = enabled;
  }

  isImageProcessingEnabled(): boolean {
    return this.imageProcessing;
  }

  async handleUpdate(raw: unknown): Promise<HandledUpdate> {
    const message = normalizeUpdate(raw);
    if (!message) return { kind: "ignored" };

    const { record } = message;
    await this.record(message);

    // Imágenes: solo si el OCR está habilitado
    if (message.image && this.imageProcessing) {
      const outcome = await this.pipeline.handleImage({
        chatId: record.chatId,
        messageId: record.messageId,
        fileId: message.image.fileId,
        kind: message.image.kind,
      });
      return { kind: "image", message, outcome };
    }

    if (record.messageType !== "text") return { kind: "logged", message };

    const text = record.text.trim();
    const [head = "", arg = ""] = text.split(/\s+/);
    const command = head.toLowerCase().split("@")[0] ?? "";

    if (command === "/hello") {
      await this.reply(record.chatId, replies.hello);
      return { kind: "command", message, command };
    }

    if (command === "/ollama") {
      const sub = arg.toLowerCase();
      if (sub === "on" || sub === "enable") {
        this.imageProcessing = true;
        await this.reply(record.chatId, replies.ocrEnabled);
      } else if (sub === "off" || sub === "disable") {
        this.imageProcessing = false;
        await this.reply(record.chatId, replies.ocrDisabled);
      } else {
        await this.reply(record.chatId, replies.ocrStatus(this.imageProcessing));
      }
      return { kind: "command", message, command };
    }

    if (text.toLowerCase().includes("important")) {
      console.warn(`[TelegramAdapter] Mensaje importante de ${record.firstName}: ${text}`);
    }
    if (record.chatType === "group" || record.chatType === "supergroup") {
      console.info(`[TelegramAdapter] Mensaje de grupo en ${record.chatTitle}`);
    }
    return { kind: "logged", message };
  }

  // Registrar primero; si el log falla el mensaje igual se procesa
  private async record(message: NormalizedMessage): Promise<void> {
    const { record } = message;
    const who = record.username ?? record.firstName;
    console.info(`[TelegramAdapter] ${record.messageType} de ${who} en ${record.chatTitle}: ${record.text.slice(0, 50)}`);
    try {
      await this.log.append(record, this.analyzer.analyze(record.text));
    } catch (e) {
      console.error(`[TelegramAdapter] No se pudo registrar el mensaje ${message.eventId}: ${errorMessage(e)}`);
    }
  }

  private async reply(chatId: string, text: string): Promise<void> {
    try {
      await this.notifier.sendText(chatId, text);
    } catch (e) {
      console.error(`[TelegramAdapter] sendText falló: ${errorMessage(e)}`);
    }
  }
}
