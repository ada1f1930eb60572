/**
 * Message component wire types (action rows and buttons).
 */

import { Snowflake } from './snowflake.js';

export enum ComponentType {
  ActionRow = 1,
  Button = 2,
}

export enum ButtonStyle {
  Primary = 1,
  Secondary = 2,
  Success = 3,
  Danger = 4,
  /** Opens `url`; the only style without a custom id */
  Link = 5,
}

/**
 * Styles available to buttons that carry a custom id.
 */
export type NonLinkButtonStyle = Exclude<ButtonStyle, ButtonStyle.Link>;

/**
 * Unicode emoji by `name`, or a custom emoji by `id`.
 */
export interface PartialEmoji {
  id?: Snowflake | null;
  name?: string | null;
  animated?: boolean;
}

interface ButtonFields {
  type: ComponentType.Button;
  label?: string;
  emoji?: PartialEmoji;
  disabled?: boolean;
}

export interface LinkButton extends ButtonFields {
  style: ButtonStyle.Link;
  url: string;
}

export interface RegularButton extends ButtonFields {
  style: NonLinkButtonStyle;
  custom_id: string;
}

export type Button = LinkButton | RegularButton;

export interface ActionRow {
  type: ComponentType.ActionRow;
  components: Button[];
}
