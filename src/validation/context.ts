/**
 * Mutable state shared by one validation pass over a message.
 */

import {
  DuplicateIdentifierError,
  LengthExceededError,
  LimitExceededError,
} from '../errors/index.js';
import { Embed, characterLength, getEmbedCharacterCount } from '../types/index.js';
import { Limits } from './limits.js';

/**
 * Accumulates message-wide state while the checker walks the tree.
 *
 * A context is single-use: create one per validation pass and discard it
 * afterwards. Counters are not rolled back when a check fails, so a context
 * that has seen an error must not be reused.
 */
export class ValidationContext {
  private readonly seenCustomIds = new Set<string>();
  private embedChars = 0;
  private rowButtons = 0;

  /** Characters counted so far across all embeds */
  get embedCharTotal(): number {
    return this.embedChars;
  }

  /** Buttons registered in the action row being validated */
  get buttonsInCurrentRow(): number {
    return this.rowButtons;
  }

  /** Whether `id` has already been registered in this pass */
  hasCustomId(id: string): boolean {
    return this.seenCustomIds.has(id);
  }

  /**
   * Reserves a custom id for the rest of the pass.
   * @throws LengthExceededError if the id length is out of range
   * @throws DuplicateIdentifierError if the id was registered before, in any row
   */
  registerCustomId(id: string): void {
    const { name, interval } = Limits.customId;
    const length = characterLength(id);
    if (!interval.contains(length)) {
      throw new LengthExceededError(name, interval, length);
    }
    if (this.seenCustomIds.has(id)) {
      throw new DuplicateIdentifierError(id);
    }
    this.seenCustomIds.add(id);
  }

  /**
   * Registers a custom-id button in the current action row.
   * @throws LimitExceededError if the row now holds too many buttons
   */
  registerButton(id: string): void {
    this.registerCustomId(id);
    this.rowButtons += 1;

    const { name, interval } = Limits.buttonsPerRow;
    if (!interval.contains(this.rowButtons)) {
      throw new LimitExceededError(name, interval, this.rowButtons);
    }
  }

  /** Starts counting buttons for a new action row. */
  beginActionRow(): void {
    this.rowButtons = 0;
  }

  /**
   * Adds the embed's text to the message-wide character total.
   * @throws LimitExceededError if the running total is over the limit
   */
  registerEmbed(embed: Readonly<Embed>): void {
    this.embedChars += getEmbedCharacterCount(embed);

    const { name, interval } = Limits.embedTotalCharacters;
    if (!interval.contains(this.embedChars)) {
      throw new LimitExceededError(name, interval, this.embedChars);
    }
  }
}
