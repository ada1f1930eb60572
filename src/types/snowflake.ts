/**
 * Snowflake ID type and utilities.
 *
 * Snowflakes are 64-bit unsigned integers; they are kept as strings to avoid
 * JavaScript number precision issues.
 */

/**
 * Represents a Snowflake ID.
 */
export type Snowflake = string;

/**
 * Validates if a value is a Snowflake ID.
 */
export function isValidSnowflake(value: unknown): value is Snowflake {
  if (typeof value !== 'string') return false;
  if (!/^\d{17,20}$/.test(value)) return false;
  return BigInt(value) < 1n << 64n;
}
