/**
 * Fluent builder for webhook messages, the root of the entity tree.
 */

import { ActionRowBuilder } from './action-row.js';
import { EmbedBuilder } from './embed.js';

/**
 * Top-level message fields.
 */
export interface MessageDraft {
  content?: string;
  username?: string;
  avatarUrl?: string;
  tts?: boolean;
}

/**
 * Builder for a message sent through a webhook.
 *
 * ```typescript
 * const message = new MessageBuilder()
 *   .content('Deploy finished')
 *   .username('ci')
 *   .embed((embed) => embed.title('Build #42').color(0x32a852))
 *   .actionRow((row) => row.linkButton((button) => button.label('Logs').url('https://ci.example.com/42')));
 * ```
 */
export class MessageBuilder {
  private readonly message: MessageDraft = {};
  private readonly embedList: EmbedBuilder[] = [];
  private readonly rowList: ActionRowBuilder[] = [];

  /** Set the message content */
  content(content: string): this {
    this.message.content = content;
    return this;
  }

  /** Override the webhook's username */
  username(username: string): this {
    this.message.username = username;
    return this;
  }

  /** Override the webhook's avatar */
  avatarUrl(avatarUrl: string): this {
    this.message.avatarUrl = avatarUrl;
    return this;
  }

  /** Send as text-to-speech */
  tts(tts: boolean = true): this {
    this.message.tts = tts;
    return this;
  }

  /** Adds an embed configured by the callback */
  embed(configure: (embed: EmbedBuilder) => void): this {
    const embed = new EmbedBuilder();
    configure(embed);
    this.embedList.push(embed);
    return this;
  }

  /** Adds an already built embed */
  addEmbed(embed: EmbedBuilder): this {
    this.embedList.push(embed);
    return this;
  }

  /** Adds an action row configured by the callback */
  actionRow(configure: (row: ActionRowBuilder) => void): this {
    const row = new ActionRowBuilder();
    configure(row);
    this.rowList.push(row);
    return this;
  }

  /** Adds an already built action row */
  addActionRow(row: ActionRowBuilder): this {
    this.rowList.push(row);
    return this;
  }

  /** Read-only view of the top-level fields */
  get data(): Readonly<MessageDraft> {
    return this.message;
  }

  /** Embeds in insertion order */
  get embeds(): readonly EmbedBuilder[] {
    return this.embedList;
  }

  /** Action rows in insertion order */
  get actionRows(): readonly ActionRowBuilder[] {
    return this.rowList;
  }
}
