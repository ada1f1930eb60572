/**
 * Compatibility checker for message trees.
 *
 * Walks the tree in document order and throws the first violation found:
 * embeds before action rows; inside an embed, field count, title and
 * description before author, footer and fields; inside a row, components in
 * insertion order.
 */

import { ActionRowBuilder, ButtonBuilder, EmbedBuilder, MessageBuilder } from '../builders/index.js';
import {
  EmptyCompositeError,
  LengthExceededError,
  LimitExceededError,
  MessageValidationError,
  MissingRequiredFieldError,
} from '../errors/index.js';
import { EmbedAuthor, EmbedField, EmbedFooter, characterLength } from '../types/index.js';
import { Constraint } from './interval.js';
import { ValidationContext } from './context.js';
import { Limits } from './limits.js';

/**
 * Outcome of {@link validateMessage}.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: MessageValidationError };

function checkLength(constraint: Constraint, value: string | undefined): void {
  if (value === undefined) return;
  const length = characterLength(value);
  if (!constraint.interval.contains(length)) {
    throw new LengthExceededError(constraint.name, constraint.interval, length);
  }
}

function checkCount(constraint: Constraint, count: number): void {
  if (!constraint.interval.contains(count)) {
    throw new LimitExceededError(constraint.name, constraint.interval, count);
  }
}

export function checkMessage(message: MessageBuilder, context: ValidationContext): void {
  checkCount(Limits.actionRowCount, message.actionRows.length);
  checkLength(Limits.content, message.data.content);
  checkCount(Limits.embedCount, message.embeds.length);

  for (const embed of message.embeds) {
    checkEmbed(embed, context);
  }
  for (const row of message.actionRows) {
    checkActionRow(row, context);
  }
}

export function checkEmbed(builder: EmbedBuilder, context: ValidationContext): void {
  const embed = builder.data;

  // Counted before anything else so the total covers invalid embeds too.
  context.registerEmbed(embed);

  checkCount(Limits.embedFieldCount, embed.fields?.length ?? 0);
  checkLength(Limits.embedTitle, embed.title);
  checkLength(Limits.embedDescription, embed.description);

  if (embed.author) checkEmbedAuthor(embed.author);
  if (embed.footer) checkEmbedFooter(embed.footer);

  for (const field of embed.fields ?? []) {
    checkEmbedField(field);
  }
}

export function checkEmbedAuthor(author: Readonly<EmbedAuthor>): void {
  checkLength(Limits.embedAuthorName, author.name);
}

export function checkEmbedFooter(footer: Readonly<EmbedFooter>): void {
  checkLength(Limits.embedFooterText, footer.text);
}

export function checkEmbedField(field: Readonly<EmbedField>): void {
  checkLength(Limits.embedFieldName, field.name);
  checkLength(Limits.embedFieldValue, field.value);
}

export function checkActionRow(row: ActionRowBuilder, context: ValidationContext): void {
  context.beginActionRow();

  if (row.components.length === 0) {
    throw new EmptyCompositeError('action row');
  }
  for (const component of row.components) {
    checkButton(component, context);
  }
}

export function checkButton(button: ButtonBuilder, context: ValidationContext): void {
  checkLength(Limits.buttonLabel, button.data.label);

  switch (button.kind) {
    case 'link':
      // Link buttons have no custom id and are not counted against the row.
      if (button.data.url === undefined) {
        throw new MissingRequiredFieldError('url');
      }
      return;

    case 'regular': {
      const { style, customId } = button.data;
      if (style === undefined) {
        throw new MissingRequiredFieldError('style');
      }
      if (customId === undefined) {
        throw new MissingRequiredFieldError('custom id');
      }
      context.registerButton(customId);
      return;
    }
  }
}

/**
 * Validates a message with a fresh {@link ValidationContext}.
 *
 * Only the first violation in document order is reported. Errors other than
 * validation errors propagate.
 */
export function validateMessage(message: MessageBuilder): ValidationResult {
  try {
    assertValidMessage(message);
    return { valid: true };
  } catch (error) {
    if (error instanceof MessageValidationError) {
      return { valid: false, error };
    }
    throw error;
  }
}

/**
 * Like {@link validateMessage} but throws the violation.
 * @throws MessageValidationError
 */
export function assertValidMessage(message: MessageBuilder): void {
  checkMessage(message, new ValidationContext());
}
