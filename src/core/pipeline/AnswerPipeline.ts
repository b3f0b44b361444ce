import type { ImageSourcePort } from "../ports/ImageSourcePort";
import type { ExtractorPort } from "../ports/ExtractorPort";
import type { ChatAction, NotifierPort } from "../ports/NotifierPort";
import type { GradingEngine } from "../grading/GradingEngine";
import type { EvaluationResult } from "../grading/types";
import { formatEvaluation, formatProcessingError } from "../messages/format";
import { replies } from "../messages/replies";
import { errorMessage } from "../utils/errors";

export type ImageJob = {
  chatId: string;
  messageId: number;
  fileId: string;
  kind: "photo" | "document";
};

export type PipelineOutcome =
  | { status: "evaluated"; text: string; result: EvaluationResult }
  | { status: "too_short"; text: string }
  | { status: "no_text" }
  | { status: "error"; message: string };

export type PipelineOptions = {
  /** Respuestas con esta cantidad de caracteres o menos no se califican. Default: 20 */
  minAnswerChars?: number;
};

/**
 * Una imagen entrante → descarga → transcripción → calificación → respuesta al chat.
 * Nunca lanza: los errores se responden al usuario y se registran.
 */
export class AnswerPipeline {
  private readonly minAnswerChars: number;

  constructor(
    private readonly images: ImageSourcePort,
    private readonly extractor: ExtractorPort,
    private readonly grader: GradingEngine,
    private readonly notifier: NotifierPort,
    opts: PipelineOptions = {}
  ) {
    this.minAnswerChars = opts.minAnswerChars ?? 20;
  }

  async handleImage(job: ImageJob): Promise<PipelineOutcome> {
    const reply = { replyToMessageId: job.messageId };
    try {
      await this.action(job.chatId, "typing");
      console.info(`[AnswerPipeline] Procesando ${job.kind} (file_id: ${job.fileId})`);

      const text = await this.extract(job.fileId);
      if (!text) {
        await this.notifier.sendText(job.chatId, replies.noText(job.kind), reply);
        return { status: "no_text" };
      }

      if (text.length <= this.minAnswerChars) {
        console.info("[AnswerPipeline] Respuesta demasiado corta para evaluar");
        await this.notifier.sendText(job.chatId, replies.tooShort, reply);
        return { status: "too_short", text };
      }

      await this.action(job.chatId, "typing");
      const result = await this.grader.evaluate(text);
      await this.notifier.sendText(job.chatId, formatEvaluation(result), reply);
      console.info(`[AnswerPipeline] Evaluación enviada: ${result.score}/5`);
      return { status: "evaluated", text, result };
    } catch (e) {
      console.error(`[AnswerPipeline] Error procesando ${job.kind}: ${errorMessage(e)}`);
      try {
        await this.notifier.sendText(job.chatId, formatProcessingError(job.kind, e), reply);
      } catch (sendErr) {
        console.error(`[AnswerPipeline] No se pudo notificar el error: ${errorMessage(sendErr)}`);
      }
      return { status: "error", message: errorMessage(e) };
    }
  }

  /** Descarga + OCR; el archivo temporal se borra siempre. */
  private async extract(fileId: string): Promise<string> {
    const localPath = await this.images.download(fileId);
    if (!localPath) return "";
    try {
      const text = await this.extractor.extractText(localPath);
      return (text ?? "").trim();
    } finally {
      await this.images.discard(localPath);
    }
  }

  private async action(chatId: string, action: ChatAction): Promise<void> {
    try {
      await this.notifier.sendChatAction(chatId, action);
    } catch (e) {
      // Log no bloqueante: el indicador "escribiendo" es cosmético
      console.warn(`[AnswerPipeline] sendChatAction falló: ${errorMessage(e)}`);
    }
  }
}
