/**
 * Webhook API response types.
 *
 * Responses are untrusted input, so each shape is declared as a zod schema
 * and the TypeScript type is inferred from it.
 */

import { z } from 'zod';
import { isValidSnowflake } from './snowflake.js';

/**
 * Webhook kinds.
 */
export enum WebhookType {
  /** Posts messages to channels with a generated token */
  Incoming = 1,
  /** Internal webhook used by channel following */
  ChannelFollower = 2,
  /** Used with interactions */
  Application = 3,
}

export const SnowflakeSchema = z.string().refine(isValidSnowflake, {
  message: 'Invalid snowflake ID',
});

export const UserSchema = z.object({
  id: SnowflakeSchema,
  username: z.string(),
  discriminator: z.string(),
  global_name: z.string().nullish(),
  avatar: z.string().nullish(),
  bot: z.boolean().optional(),
});

/**
 * Webhook description returned by `GET /webhooks/{id}/{token}`.
 */
export const WebhookInfoSchema = z.object({
  id: SnowflakeSchema,
  type: z.nativeEnum(WebhookType),
  guild_id: SnowflakeSchema.nullish(),
  channel_id: SnowflakeSchema.nullable(),
  name: z.string().nullable(),
  avatar: z.string().nullable(),
  token: z.string().optional(),
  application_id: SnowflakeSchema.nullable(),
  user: UserSchema.optional(),
});

const ResponseEmbedSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  url: z.string().optional(),
  color: z.number().int().optional(),
});

/**
 * Message returned when a webhook is executed with `wait=true`.
 */
export const SentMessageSchema = z.object({
  id: SnowflakeSchema,
  channel_id: SnowflakeSchema,
  author: UserSchema.optional(),
  content: z.string(),
  timestamp: z.string(),
  tts: z.boolean(),
  embeds: z.array(ResponseEmbedSchema),
  webhook_id: SnowflakeSchema.optional(),
});

export type User = z.infer<typeof UserSchema>;
export type WebhookInfo = z.infer<typeof WebhookInfoSchema>;
export type SentMessage = z.infer<typeof SentMessageSchema>;
