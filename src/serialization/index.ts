/**
 * Conversion of a validated message tree into the webhook request body.
 */

import { ActionRowBuilder, ButtonBuilder, MessageBuilder } from '../builders/index.js';
import { MissingRequiredFieldError } from '../errors/index.js';
import {
  ActionRow,
  Button,
  ButtonStyle,
  ComponentType,
  WebhookMessagePayload,
} from '../types/index.js';

/**
 * Serializes a button. Required fields are re-checked so an unvalidated
 * tree cannot produce an incomplete component.
 */
export function toButtonPayload(button: ButtonBuilder): Button {
  const { label, emoji, disabled } = button.data;

  let result: Button;
  if (button.kind === 'link') {
    const { url } = button.data;
    if (url === undefined) throw new MissingRequiredFieldError('url');
    result = { type: ComponentType.Button, style: ButtonStyle.Link, url };
  } else {
    const { style, customId } = button.data;
    if (style === undefined) throw new MissingRequiredFieldError('style');
    if (customId === undefined) throw new MissingRequiredFieldError('custom id');
    result = { type: ComponentType.Button, style, custom_id: customId };
  }

  if (label !== undefined) result.label = label;
  if (emoji !== undefined) result.emoji = { ...emoji };
  if (disabled !== undefined) result.disabled = disabled;
  return result;
}

export function toActionRowPayload(row: ActionRowBuilder): ActionRow {
  return {
    type: ComponentType.ActionRow,
    components: row.components.map(toButtonPayload),
  };
}

/**
 * Builds the JSON body for `POST /webhooks/{id}/{token}`. Unset fields are
 * omitted; `embeds` and `components` are always present.
 */
export function toWebhookPayload(message: MessageBuilder): WebhookMessagePayload {
  const { content, username, avatarUrl, tts } = message.data;

  const payload: WebhookMessagePayload = {};
  if (content !== undefined) payload.content = content;
  if (username !== undefined) payload.username = username;
  if (avatarUrl !== undefined) payload.avatar_url = avatarUrl;
  if (tts !== undefined) payload.tts = tts;
  payload.embeds = message.embeds.map((embed) => embed.build());
  payload.components = message.actionRows.map(toActionRowPayload);

  return payload;
}
