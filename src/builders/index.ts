/**
 * Message builders - public exports.
 */

export { MessageBuilder, type MessageDraft } from './message.js';
export { EmbedBuilder, type MediaSize } from './embed.js';
export { ActionRowBuilder } from './action-row.js';
export {
  LinkButtonBuilder,
  RegularButtonBuilder,
  type ButtonBuilder,
  type ButtonDraftBase,
  type LinkButtonDraft,
  type RegularButtonDraft,
} from './button.js';
