/**
 * Documented platform limits for webhook messages.
 *
 * Each limit is declared once here; the checker and the validation context
 * read them and never hard-code a bound.
 */

import { Constraint, constraint } from './interval.js';

/** Maximum characters allowed in message content */
export const MAX_MESSAGE_CONTENT_LENGTH = 2000;

/** Maximum number of embeds per message */
export const MAX_EMBEDS_PER_MESSAGE = 10;

/** Maximum total characters across all embeds */
export const MAX_EMBED_TOTAL_CHARACTERS = 6000;

/** Maximum number of action rows per message */
export const MAX_ACTION_ROWS = 5;

/** Maximum number of buttons per action row */
export const MAX_BUTTONS_PER_ROW = 5;

/** Maximum number of fields per embed */
export const MAX_EMBED_FIELDS = 25;

/** Maximum button label length */
export const MAX_BUTTON_LABEL_LENGTH = 80;

/** Maximum custom id length */
export const MAX_CUSTOM_ID_LENGTH = 100;

/**
 * All message limits, keyed by what they constrain.
 */
export const Limits = {
  // Message
  content: constraint('content', 0, MAX_MESSAGE_CONTENT_LENGTH),
  embedCount: constraint('embed', 0, MAX_EMBEDS_PER_MESSAGE),
  actionRowCount: constraint('action row', 0, MAX_ACTION_ROWS),

  // Embeds
  embedTotalCharacters: constraint('character count across all embeds', 0, MAX_EMBED_TOTAL_CHARACTERS),
  embedFieldCount: constraint('field', 0, MAX_EMBED_FIELDS),
  embedTitle: constraint('embed title', 0, 256),
  embedDescription: constraint('embed description', 0, 4096),
  embedFooterText: constraint('embed footer text', 0, 2048),
  embedAuthorName: constraint('embed author name', 0, 256),
  embedFieldName: constraint('embed field name', 0, 256),
  embedFieldValue: constraint('embed field value', 0, 1024),

  // Components
  buttonsPerRow: constraint('button', 0, MAX_BUTTONS_PER_ROW),
  buttonLabel: constraint('label', 0, MAX_BUTTON_LABEL_LENGTH),
  customId: constraint('custom id', 1, MAX_CUSTOM_ID_LENGTH),
} as const satisfies Record<string, Constraint>;
