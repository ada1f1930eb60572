/**
 * Fluent builders for link and regular buttons.
 */

import { NonLinkButtonStyle, PartialEmoji } from '../types/index.js';

/**
 * Fields shared by both button variants.
 */
export interface ButtonDraftBase {
  label?: string;
  emoji?: PartialEmoji;
  disabled?: boolean;
}

/**
 * Link button as assembled by the caller; `url` is required before sending.
 */
export interface LinkButtonDraft extends ButtonDraftBase {
  url?: string;
}

/**
 * Regular button as assembled by the caller; `style` and `customId` are
 * required before sending.
 */
export interface RegularButtonDraft extends ButtonDraftBase {
  style?: NonLinkButtonStyle;
  customId?: string;
}

/**
 * Common setters for both variants.
 */
abstract class ButtonBuilderBase<TDraft extends ButtonDraftBase> {
  protected readonly button: TDraft;

  protected constructor(button: TDraft) {
    this.button = button;
  }

  /** Set the button label */
  label(label: string): this {
    this.button.label = label;
    return this;
  }

  /** Set the button emoji */
  emoji(emoji: PartialEmoji | string): this {
    this.button.emoji = typeof emoji === 'string' ? { name: emoji } : emoji;
    return this;
  }

  /** Enable or disable the button */
  disabled(disabled: boolean = true): this {
    this.button.disabled = disabled;
    return this;
  }

  /** Read-only view of the button under construction */
  get data(): Readonly<TDraft> {
    return this.button;
  }
}

/**
 * Builder for buttons that open a URL. Their style is always Link.
 */
export class LinkButtonBuilder extends ButtonBuilderBase<LinkButtonDraft> {
  readonly kind = 'link';

  constructor() {
    super({});
  }

  /** Set the URL opened by the button */
  url(url: string): this {
    this.button.url = url;
    return this;
  }
}

/**
 * Builder for buttons identified by a custom id.
 */
export class RegularButtonBuilder extends ButtonBuilderBase<RegularButtonDraft> {
  readonly kind = 'regular';

  constructor() {
    super({});
  }

  /** Set the button style */
  style(style: NonLinkButtonStyle): this {
    this.button.style = style;
    return this;
  }

  /** Set the custom id sent back with interactions */
  customId(customId: string): this {
    this.button.customId = customId;
    return this;
  }
}

/**
 * Any button that can be placed in an action row.
 */
export type ButtonBuilder = LinkButtonBuilder | RegularButtonBuilder;
