/**
 * Webhook types - public exports.
 */

export { type Snowflake, isValidSnowflake } from './snowflake.js';

export {
  type EmbedFooter,
  type EmbedMedia,
  type EmbedAuthor,
  type EmbedField,
  type Embed,
  type WebhookMessagePayload,
  getEmbedCharacterCount,
  characterLength,
} from './message.js';

export {
  ComponentType,
  ButtonStyle,
  type NonLinkButtonStyle,
  type PartialEmoji,
  type LinkButton,
  type RegularButton,
  type Button,
  type ActionRow,
} from './component.js';

export {
  WebhookType,
  SnowflakeSchema,
  UserSchema,
  WebhookInfoSchema,
  SentMessageSchema,
  type User,
  type WebhookInfo,
  type SentMessage,
} from './webhook.js';
