export interface SendTextOptions {
  /** Responde citando este mensaje del chat. */
  replyToMessageId?: number;
}

export type ChatAction = 'typing' | 'upload_photo' | 'upload_document';

export abstract class NotifierPort {
  abstract sendText(chatId: string, text: string, opts?: SendTextOptions): Promise<void>;
  abstract sendChatAction(chatId: string, action: ChatAction): Promise<void>;
}
