import { z } from "zod";

const Id = z.union([z.number(), z.string()]);

export const TgUserSchema = z.object({
  id: Id,
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export const TgChatSchema = z.object({
  id: Id,
  type: z.string(),
  title: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export const TgPhotoSizeSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  file_size: z.number().optional(),
});

export const TgDocumentSchema = z.object({
  file_id: z.string(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
});

const Media = z.object({ file_id: z.string() }).passthrough();

export const TgMessageSchema = z.object({
  message_id: z.number(),
  date: z.number(),                 // epoch seconds
  text: z.string().optional(),
  caption: z.string().optional(),
  from: TgUserSchema.optional(),
  chat: TgChatSchema,
  photo: z.array(TgPhotoSizeSchema).optional(),
  document: TgDocumentSchema.optional(),
  audio: Media.optional(),
  video: Media.optional(),
  voice: Media.optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  sticker: z.object({ file_id: z.string(), emoji: z.string().optional() }).optional(),
  forward_date: z.number().optional(),
  forward_origin: z.unknown().optional(),
  reply_to_message: z.object({ message_id: z.number() }).passthrough().optional(),
});

export const TgUpdateSchema = z.object({
  update_id: z.number(),
  message: TgMessageSchema.optional(),
});

export type TgPhotoSize = z.infer<typeof TgPhotoSizeSchema>;
export type TgMessage = z.infer<typeof TgMessageSchema>;
