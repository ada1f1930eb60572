/**
 * Message validation - public exports.
 */

export { Interval, type Widen, type Constraint, constraint } from './interval.js';
export {
  Limits,
  MAX_MESSAGE_CONTENT_LENGTH,
  MAX_EMBEDS_PER_MESSAGE,
  MAX_EMBED_TOTAL_CHARACTERS,
  MAX_ACTION_ROWS,
  MAX_BUTTONS_PER_ROW,
  MAX_EMBED_FIELDS,
  MAX_BUTTON_LABEL_LENGTH,
  MAX_CUSTOM_ID_LENGTH,
} from './limits.js';
export { ValidationContext } from './context.js';
export {
  type ValidationResult,
  checkMessage,
  checkEmbed,
  checkEmbedAuthor,
  checkEmbedFooter,
  checkEmbedField,
  checkActionRow,
  checkButton,
  validateMessage,
  assertValidMessage,
} from './checker.js';
