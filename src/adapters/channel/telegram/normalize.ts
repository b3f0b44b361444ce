import type { ImageAttachment, MessageRecord, MessageType, NormalizedMessage } from "../../../core/types/NormalizedMessage";
import { TgUpdateSchema, type TgMessage, type TgPhotoSize } from "./types";

type Classified = {
  type: MessageType;
  text: string;
  hasMedia: boolean;
  image: ImageAttachment | null;
};

/**
 * Convierte un update crudo del Bot API en un mensaje normalizado.
 * Devuelve null si no es un mensaje (p.ej. callback_query) o no trae remitente.
 */
export function normalizeUpdate(raw: unknown, now: Date = new Date()): NormalizedMessage | null {
  const parsed = TgUpdateSchema.safeParse(raw);
  if (!parsed.success) return null;

  const msg = parsed.data.message;
  if (!msg || !msg.from) return null;

  const user = msg.from;
  const c = classify(msg);
  const fullName = `${user.first_name ?? ""} ${user.last_name ?? ""}`.trim();

  const record: MessageRecord = {
    timestamp: now.toISOString(),
    messageId: msg.message_id,
    chatId: String(msg.chat.id),
    chatTitle: msg.chat.title || fullName,
    chatType: msg.chat.type,
    userId: String(user.id),
    username: user.username ?? null,
    firstName: user.first_name ?? "",
    lastName: user.last_name ?? null,
    text: c.text,
    messageType: c.type,
    hasMedia: c.hasMedia,
    mediaType: c.hasMedia ? c.type : null,
    isForwarded: msg.forward_date !== undefined || msg.forward_origin !== undefined,
    replyToMessage: msg.reply_to_message?.message_id ?? null,
  };

  return {
    provider: "telegram",
    eventId: String(parsed.data.update_id),
    record,
    image: c.image,
  };
}

function classify(msg: TgMessage): Classified {
  const photo = msg.photo ? largestPhoto(msg.photo) : null;
  if (photo) {
    return { type: "photo", text: msg.caption || "[Photo]", hasMedia: true, image: { fileId: photo.file_id, kind: "photo" } };
  }
  if (msg.document) {
    const isImage = (msg.document.mime_type ?? "").startsWith("image/");
    return {
      type: "document",
      text: `[Document: ${msg.document.file_name ?? "unnamed"}]`,
      hasMedia: true,
      image: isImage ? { fileId: msg.document.file_id, kind: "document" } : null,
    };
  }
  if (msg.audio) return media("audio", "[Audio]");
  if (msg.video) return media("video", "[Video]");
  if (msg.voice) return media("voice", "[Voice Message]");
  if (msg.location) {
    const { latitude, longitude } = msg.location;
    return { type: "location", text: `[Location: ${latitude}, ${longitude}]`, hasMedia: false, image: null };
  }
  if (msg.sticker) return media("sticker", `[Sticker: ${msg.sticker.emoji ?? ""}]`);
  return { type: "text", text: msg.text ?? "", hasMedia: false, image: null };
}

function media(type: MessageType, text: string): Classified {
  return { type, text, hasMedia: true, image: null };
}

/** La variante de mayor peso; en empate, la primera. */
export function largestPhoto(sizes: readonly TgPhotoSize[]): TgPhotoSize | null {
  let best: TgPhotoSize | null = null;
  for (const s of sizes) {
    if (!best || (s.file_size ?? 0) > (best.file_size ?? 0)) best = s;
  }
  return best;
}
