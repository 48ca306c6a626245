/**
 * @module human-number
 * Short-scale rendering of counts and other magnitudes
 *
 * Values of a thousand and above are expressed in thousands, millions,
 * billions and so on with one decimal digit: `1_200` is "1.2K" concisely and
 * "1.2 thousand" in full. Smaller values render as the plain number.
 *
 * @public
 */

import { HumanValue, OutputFormat } from "./human-value.js";
import {
  type Ladder,
  powerLadder,
  renderScaledValue,
  scaleMagnitude,
  toPlainString,
} from "./scale-selector.js";
import { MagnitudeSchema, parseInput, type Magnitude } from "./schemas.js";

/**
 * Short-scale ladder, steps of 1000
 *
 * @internal
 */
export const NUMBER_LADDER: Ladder = powerLadder(
  1000,
  ["", "K", "M", "B", "T", "Q", "Qi"],
  ["", "thousand", "million", "billion", "trillion", "quadrillion", "quintillion"],
);

/**
 * Decimal digits shown for scaled numbers
 *
 * @internal
 */
const NUMBER_DIGITS = 1;

/**
 * Human-readable count or magnitude
 *
 * @example
 * ```typescript
 * HumanNumber.from(1_200).concise();        // "1.2K"
 * HumanNumber.from(1_000_000).full();       // "1 million"
 * HumanNumber.from(-1_500).concise();       // "-1.5K"
 * HumanNumber.from(1_234_567).grouped();    // "1,234,567"
 * ```
 *
 * @public
 */
export class HumanNumber extends HumanValue {
  private constructor(private readonly value: Magnitude) {
    super();
  }

  /**
   * Wrap a number or bigint
   *
   * @throws {@link InvalidInputError} For NaN or an infinite number
   */
  static from(value: Magnitude): HumanNumber {
    return new HumanNumber(
      parseInput(MagnitudeSchema, value, "number", "a finite number or bigint"),
    );
  }

  /**
   * The wrapped value as a number
   */
  get raw(): number {
    return Number(this.value);
  }

  format(format: OutputFormat): string {
    const { unit, rounded } = scaleMagnitude(this.raw, NUMBER_LADDER, NUMBER_DIGITS);
    const text = renderScaledValue(rounded, NUMBER_DIGITS);

    if (format === OutputFormat.Concise) {
      return `${text}${unit.symbol}`;
    }
    return unit.word ? `${text} ${unit.word}` : text;
  }

  /**
   * Render the exact value with comma thousands separators
   */
  grouped(): string {
    return groupDigits(this.value);
  }
}

/**
 * Alias kept for callers that think of the wrapped value as a count
 *
 * @public
 */
export const HumanCount = HumanNumber;

/**
 * @public
 */
export type HumanCount = HumanNumber;

/**
 * Insert comma separators between groups of three integer digits
 *
 * Numbers are written out in full first, so neither very large nor very
 * small values show up in exponent notation.
 *
 * @param value - Number or bigint to render
 *
 * @example
 * ```typescript
 * groupDigits(1234567.5); // "1,234,567.5"
 * groupDigits(-1000n);    // "-1,000"
 * groupDigits(1e-7);      // "0.0000001"
 * ```
 *
 * @public
 */
export function groupDigits(value: number | bigint): string {
  const text = typeof value === "bigint" ? value.toString() : toPlainString(value);

  const negative = text.startsWith("-");
  const unsigned = negative ? text.slice(1) : text;
  const [integerPart, ...fractionParts] = unsigned.split(".");
  const grouped = integerPart.replaceAll(/\B(?=(\d{3})+(?!\d))/g, ",");
  const fraction = fractionParts.length > 0 ? `.${fractionParts.join(".")}` : "";

  return `${negative ? "-" : ""}${grouped}${fraction}`;
}
