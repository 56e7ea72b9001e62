import { z } from "zod";

/**
 * Telegram Bot API envelope: every method answers
 * `{ ok, result?, description?, error_code? }`.
 */
export const telegramApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
});

export type TelegramApiResponse = z.infer<typeof telegramApiResponseSchema>;

/**
 * The subset of a Telegram `Message` we read back after sending.
 * Unknown fields are kept as-is.
 */
export const telegramMessageSchema = z
  .object({
    message_id: z.number().int(),
    date: z.number().int().optional(),
    chat: z
      .object({
        id: z.union([z.number(), z.string()]),
        type: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type TelegramMessage = z.infer<typeof telegramMessageSchema>;

export type TelegramMethod = "sendMessage" | "sendDocument" | "sendPhoto";
