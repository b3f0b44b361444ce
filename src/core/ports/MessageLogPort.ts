import type { MessageRecord } from "../types/NormalizedMessage";
import type { MessageAnalysis } from "../messages/analysis";

export type StoredMessage = MessageRecord & { analysis: MessageAnalysis | null };

/** Log de mensajes de solo-anexado: sin updates ni deletes. */
export interface MessageLogPort {
  append(record: MessageRecord, analysis?: MessageAnalysis): Promise<void>;
  load(limit?: number): Promise<StoredMessage[]>;
  byChat(chatId: string): Promise<StoredMessage[]>;
  byUser(userId: string): Promise<StoredMessage[]>;
}
