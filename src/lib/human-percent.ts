/**
 * @module human-percent
 * Percentages rounded to a fixed number of decimal digits
 *
 * @public
 */

import { HumanValue, OutputFormat } from "./human-value.js";
import { logger } from "./logger.js";
import { roundHalfAwayFromZero, toPlainString } from "./scale-selector.js";
import { parseInput, PercentValueSchema, PrecisionSchema } from "./schemas.js";

const percentLogger = logger.child({}, "human-percent");

/**
 * Rendered for NaN and infinite percentages
 *
 * @internal
 */
const NOT_A_PERCENTAGE = "-";

/**
 * Human-readable percentage
 *
 * The value is already a percentage (12.5 means 12.5%) and is not bounds
 * checked. Rounded values render in their shortest form, so trailing zeros
 * are not padded.
 *
 * @example
 * ```typescript
 * HumanPercent.from(12.3456, 1).concise(); // "12.3%"
 * HumanPercent.from(12.3456, 2).full();    // "12.35 percent"
 * HumanPercent.from(12.3456).concise();    // "12%"
 * HumanPercent.from(1e-7, 7).concise();     // "0.0000001%"
 * ```
 *
 * @public
 */
export class HumanPercent extends HumanValue {
  private constructor(
    readonly value: number,
    readonly precision: number,
  ) {
    super();
  }

  /**
   * Wrap a percentage
   *
   * @param value - Percentage value
   * @param precision - Decimal digits to keep, 0 to 20
   * @throws {@link InvalidInputError} For a precision outside 0 to 20 or a non-number value
   */
  static from(value: number, precision = 0): HumanPercent {
    return new HumanPercent(
      parseInput(PercentValueSchema, value, "percentage", "a number"),
      parseInput(PrecisionSchema, precision, "precision", "a whole number from 0 to 20"),
    );
  }

  /**
   * The value rounded half away from zero to `precision` digits
   */
  get rounded(): number {
    return roundHalfAwayFromZero(this.value, this.precision);
  }

  format(format: OutputFormat): string {
    const rounded = this.rounded;
    if (!Number.isFinite(rounded)) {
      percentLogger.debug("Rendering non-finite percentage as placeholder", {
        value: this.value,
      });
      return NOT_A_PERCENTAGE;
    }

    const text = toPlainString(rounded);
    return format === OutputFormat.Concise ? `${text}%` : `${text} percent`;
  }
}
