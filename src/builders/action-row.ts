/**
 * Fluent builder for action rows.
 */

import { ButtonBuilder, LinkButtonBuilder, RegularButtonBuilder } from './button.js';

/**
 * Builder for a horizontal row of buttons.
 */
export class ActionRowBuilder {
  private readonly buttons: ButtonBuilder[] = [];

  /**
   * Adds a regular button configured by the callback.
   *
   * ```typescript
   * row.regularButton((button) => button.style(ButtonStyle.Primary).customId('approve'));
   * ```
   */
  regularButton(configure: (button: RegularButtonBuilder) => void): this {
    const button = new RegularButtonBuilder();
    configure(button);
    this.buttons.push(button);
    return this;
  }

  /** Adds a link button configured by the callback. */
  linkButton(configure: (button: LinkButtonBuilder) => void): this {
    const button = new LinkButtonBuilder();
    configure(button);
    this.buttons.push(button);
    return this;
  }

  /** Adds an already built button. */
  addButton(button: ButtonBuilder): this {
    this.buttons.push(button);
    return this;
  }

  /** Components in insertion order */
  get components(): readonly ButtonBuilder[] {
    return this.buttons;
  }
}
