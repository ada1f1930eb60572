/**
 * Fluent builder for rich embeds.
 */

import { Embed, EmbedAuthor, EmbedField, EmbedFooter, EmbedMedia } from '../types/index.js';

/**
 * Optional media dimensions.
 */
export interface MediaSize {
  width?: number;
  height?: number;
}

/**
 * Builder for embeds.
 *
 * Setters only record values; limits are enforced when the owning message is
 * validated.
 */
export class EmbedBuilder {
  private readonly embed: Embed = { type: 'rich' };

  /** Set the embed title */
  title(title: string): this {
    this.embed.title = title;
    return this;
  }

  /** Set the embed description */
  description(description: string): this {
    this.embed.description = description;
    return this;
  }

  /** Set the embed URL */
  url(url: string): this {
    this.embed.url = url;
    return this;
  }

  /** Set the embed color (accepts hex number like 0xFF0000) */
  color(color: number): this {
    this.embed.color = color;
    return this;
  }

  /** Set the embed timestamp, defaulting to now */
  timestamp(timestamp?: Date | string): this {
    if (timestamp instanceof Date) {
      this.embed.timestamp = timestamp.toISOString();
    } else if (timestamp) {
      this.embed.timestamp = timestamp;
    } else {
      this.embed.timestamp = new Date().toISOString();
    }
    return this;
  }

  /** Set the embed footer */
  footer(text: string, iconUrl?: string): this {
    const footer: EmbedFooter = { text };
    if (iconUrl) footer.icon_url = iconUrl;
    this.embed.footer = footer;
    return this;
  }

  /** Set the embed image */
  image(url: string, size?: MediaSize): this {
    this.embed.image = media(url, size);
    return this;
  }

  /** Set the embed thumbnail */
  thumbnail(url: string, size?: MediaSize): this {
    this.embed.thumbnail = media(url, size);
    return this;
  }

  /** Set the embed video */
  video(url: string, size?: MediaSize): this {
    this.embed.video = media(url, size);
    return this;
  }

  /** Set the embed author */
  author(name: string, url?: string, iconUrl?: string): this {
    const author: EmbedAuthor = { name };
    if (url) author.url = url;
    if (iconUrl) author.icon_url = iconUrl;
    this.embed.author = author;
    return this;
  }

  /** Add a field to the embed */
  addField(name: string, value: string, inline: boolean = false): this {
    const field: EmbedField = { name, value, inline };
    if (!this.embed.fields) {
      this.embed.fields = [];
    }
    this.embed.fields.push(field);
    return this;
  }

  /** Read-only view of the embed under construction */
  get data(): Readonly<Embed> {
    return this.embed;
  }

  /** Build a detached copy of the embed */
  build(): Embed {
    const embed: Embed = { ...this.embed };
    if (this.embed.fields) {
      embed.fields = this.embed.fields.map((field) => ({ ...field }));
    }
    return embed;
  }
}

function media(url: string, size?: MediaSize): EmbedMedia {
  const result: EmbedMedia = { url };
  if (size?.width !== undefined) result.width = size.width;
  if (size?.height !== undefined) result.height = size.height;
  return result;
}
