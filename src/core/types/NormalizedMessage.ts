export const MESSAGE_TYPES = [
  "text",
  "photo",
  "document",
  "audio",
  "video",
  "voice",
  "location",
  "sticker",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface MessageRecord {
  timestamp: string;          // ISO-8601, hora de recepción
  messageId: number;
  chatId: string;
  chatTitle: string;
  chatType: string;           // "private" | "group" | "supergroup" | "channel"
  userId: string;
  username: string | null;
  firstName: string;
  lastName: string | null;
  text: string;
  messageType: MessageType;
  hasMedia: boolean;
  mediaType: MessageType | null;
  isForwarded: boolean;
  replyToMessage: number | null;
}

/** Imagen adjunta que el pipeline puede descargar y transcribir. */
export interface ImageAttachment {
  fileId: string;
  kind: "photo" | "document";
}

export interface NormalizedMessage {
  provider: "telegram";
  eventId: string;
  record: MessageRecord;
  image: ImageAttachment | null;
}
