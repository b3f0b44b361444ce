import { NotifierPort, type ChatAction, type SendTextOptions } from "../../../core/ports/NotifierPort";
import type { TelegramBotApi } from "./TelegramBotApi";

/**
 * Notificador vía Telegram Bot API: texto plano (sin parse_mode) y acciones de chat.
 */
export class TelegramHttpNotifier extends NotifierPort {
  constructor(private readonly api: TelegramBotApi) {
    super();
  }

  async sendText(chatId: string, text: string, opts: SendTextOptions = {}): Promise<void> {
    const body: Record<string, unknown> = {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    };
    if (opts.replyToMessageId) body.reply_to_message_id = opts.replyToMessageId;
    await this.api.call("sendMessage", body);
  }

  async sendChatAction(chatId: string, action: ChatAction): Promise<void> {
    await this.api.call("sendChatAction", { chat_id: chatId, action });
  }
}
