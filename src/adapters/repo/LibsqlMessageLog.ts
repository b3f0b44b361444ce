import type { Client, InStatement } from "@libsql/client";
import { z } from "zod";
import type { MessageLogPort, StoredMessage } from "../../core/ports/MessageLogPort";
import type { MessageAnalysis } from "../../core/messages/analysis";
import { MESSAGE_TYPES, type MessageRecord } from "../../core/types/NormalizedMessage";
import { safeJson } from "../http/fetch";

const MessageTypeSchema = z.enum(MESSAGE_TYPES);
const flag = z.union([z.number(), z.bigint()]).transform(v => Number(v) !== 0);
const int = z.union([z.number(), z.bigint()]).transform(v => Number(v));

const AnalysisSchema = z.object({
  isHighlighted: z.boolean(),
  mentions: z.array(z.string()),
  hashtags: z.array(z.string()),
  urls: z.array(z.string()),
  wordCount: z.number(),
  charCount: z.number(),
  hasSpecialContent: z.boolean(),
});

const RowSchema = z.object({
  id: int,
  timestamp: z.string(),
  message_id: int,
  chat_id: z.string(),
  chat_title: z.string(),
  chat_type: z.string(),
  user_id: z.string(),
  username: z.string().nullable(),
  first_name: z.string(),
  last_name: z.string().nullable(),
  text: z.string(),
  message_type: MessageTypeSchema,
  has_media: flag,
  media_type: MessageTypeSchema.nullable(),
  is_forwarded: flag,
  reply_to_message: int.nullable(),
  analysis: z.string().nullable(),
});

const COLUMNS = `id, timestamp, message_id, chat_id, chat_title, chat_type, user_id, username,
  first_name, last_name, text, message_type, has_media, media_type, is_forwarded,
  reply_to_message, analysis`;

/**
 * Log de mensajes sobre libsql. Solo INSERT y SELECT: nunca se actualiza ni borra una fila.
 */
export class LibsqlMessageLog implements MessageLogPort {
  constructor(private readonly db: Client) {}

  async append(record: MessageRecord, analysis?: MessageAnalysis): Promise<void> {
    await this.db.execute({
      sql: `INSERT INTO message_log (
              timestamp, message_id, chat_id, chat_title, chat_type, user_id, username,
              first_name, last_name, text, message_type, has_media, media_type,
              is_forwarded, reply_to_message, analysis
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        record.timestamp,
        record.messageId,
        record.chatId,
        record.chatTitle,
        record.chatType,
        record.userId,
        record.username,
        record.firstName,
        record.lastName,
        record.text,
        record.messageType,
        record.hasMedia ? 1 : 0,
        record.mediaType,
        record.isForwarded ? 1 : 0,
        record.replyToMessage,
        analysis ? JSON.stringify(analysis) : null,
      ],
    });
  }

  /** Los `limit` mensajes más recientes en orden de llegada; sin límite, todos. */
  async load(limit?: number): Promise<StoredMessage[]> {
    if (limit === undefined) {
      return this.select(`SELECT ${COLUMNS} FROM message_log ORDER BY id`);
    }
    return this.select({
      sql: `SELECT * FROM (SELECT ${COLUMNS} FROM message_log ORDER BY id DESC LIMIT ?) ORDER BY id`,
      args: [Math.max(0, Math.trunc(limit))],
    });
  }

  async byChat(chatId: string): Promise<StoredMessage[]> {
    return this.select({ sql: `SELECT ${COLUMNS} FROM message_log WHERE chat_id = ? ORDER BY id`, args: [chatId] });
  }

  async byUser(userId: string): Promise<StoredMessage[]> {
    return this.select({ sql: `SELECT ${COLUMNS} FROM message_log WHERE user_id = ? ORDER BY id`, args: [userId] });
  }

  private async select(stmt: InStatement): Promise<StoredMessage[]> {
    const { rows } = await this.db.execute(stmt);
    const out: StoredMessage[] = [];
    for (const r of rows) {
      const parsed = RowSchema.safeParse(r);
      if (!parsed.success) {
        console.warn(`[LibsqlMessageLog] Fila inválida ignorada: ${parsed.error.issues[0]?.message ?? "?"}`);
        continue;
      }
      out.push(toStored(parsed.data));
    }
    return out;
  }
}

function toStored(row: z.infer<typeof RowSchema>): StoredMessage {
  return {
    timestamp: row.timestamp,
    messageId: row.message_id,
    chatId: row.chat_id,
    chatTitle: row.chat_title,
    chatType: row.chat_type,
    userId: row.user_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    text: row.text,
    messageType: row.message_type,
    hasMedia: row.has_media,
    mediaType: row.media_type,
    isForwarded: row.is_forwarded,
    replyToMessage: row.reply_to_message,
    analysis: parseAnalysis(row.analysis),
  };
}

function parseAnalysis(raw: string | null): MessageAnalysis | null {
  if (raw === null) return null;
  const parsed = AnalysisSchema.safeParse(safeJson(raw));
  return parsed.success ? parsed.data : null;
}
