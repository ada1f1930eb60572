/**
 * Outbound message payload types.
 *
 * Property names follow the webhook API's snake_case JSON.
 */

import { ActionRow } from './component.js';

export interface EmbedFooter {
  text: string;
  icon_url?: string;
}

/**
 * Image, thumbnail or video reference. Dimensions are hints only.
 */
export interface EmbedMedia {
  url: string;
  width?: number;
  height?: number;
}

export interface EmbedAuthor {
  name: string;
  url?: string;
  icon_url?: string;
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Rich embed. Webhooks can only send the `rich` type.
 */
export interface Embed {
  type?: 'rich';
  title?: string;
  description?: string;
  url?: string;
  /** ISO 8601 */
  timestamp?: string;
  /** 0xRRGGBB as a decimal integer */
  color?: number;
  footer?: EmbedFooter;
  image?: EmbedMedia;
  thumbnail?: EmbedMedia;
  video?: EmbedMedia;
  author?: EmbedAuthor;
  fields?: EmbedField[];
}

/**
 * JSON body of `POST /webhooks/{id}/{token}`.
 */
export interface WebhookMessagePayload {
  content?: string;
  /** Overrides the webhook's name for this message */
  username?: string;
  /** Overrides the webhook's avatar for this message */
  avatar_url?: string;
  tts?: boolean;
  embeds?: Embed[];
  components?: ActionRow[];
}

/**
 * Length of a string in Unicode code points, the unit every text limit is
 * measured in. A surrogate pair such as an emoji counts once.
 */
export function characterLength(value: string): number {
  return [...value].length;
}

/**
 * Characters an embed contributes to the message-wide embed total: title,
 * description, footer text, author name and each field's name and value.
 */
export function getEmbedCharacterCount(embed: Readonly<Embed>): number {
  const parts = [
    embed.title,
    embed.description,
    embed.footer?.text,
    embed.author?.name,
    ...(embed.fields ?? []).flatMap((field) => [field.name, field.value]),
  ];
  return parts.reduce(
    (total, part) => total + (part === undefined ? 0 : characterLength(part)),
    0
  );
}
