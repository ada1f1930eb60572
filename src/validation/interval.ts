/**
 * Closed numeric ranges used to describe length and count limits.
 */

/**
 * Widens a numeric literal type to `number` or `bigint`.
 */
export type Widen<T extends number | bigint> = T extends number ? number : bigint;

/**
 * Closed inclusive range `[min, max]`.
 *
 * Purely descriptive: an Interval never enforces anything on its own, the
 * checker asks it whether a measured value is acceptable.
 *
 * ```typescript
 * new Interval(1, 100).contains(50); // true
 * new Interval(0n, 10n).contains(11n); // false
 * ```
 */
export class Interval<T extends number | bigint = number> {
  readonly min: Widen<T>;
  readonly max: Widen<T>;

  constructor(min: T & Widen<T>, max: T & Widen<T>) {
    this.min = min;
    this.max = max;
  }

  /** True iff `min <= value <= max`. */
  contains(value: Widen<T>): boolean {
    return this.min <= value && value <= this.max;
  }

  toString(): string {
    return `[${this.min}, ${this.max}]`;
  }
}

/**
 * A limit paired with the human-readable name used in error messages.
 */
export interface Constraint {
  /** Name of the constrained field or collection (e.g. "custom id") */
  readonly name: string;
  /** Accepted range */
  readonly interval: Interval;
}

/**
 * Creates a constraint for `name` accepting `[min, max]`.
 */
export function constraint(name: string, min: number, max: number): Constraint {
  return { name, interval: new Interval(min, max) };
}
