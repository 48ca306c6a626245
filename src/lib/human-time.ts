/**
 * @module human-time
 * Absolute spans as hours, minutes and seconds
 *
 * @public
 */

import { HumanValue, OutputFormat, pluralize } from "./human-value.js";
import { toPlainString } from "./scale-selector.js";
import { parseInput, SpanLengthSchema } from "./schemas.js";

/**
 * A span decomposed into whole units
 *
 * `hours * 3600 + minutes * 60 + seconds` equals the span's total seconds;
 * minutes and seconds are in [0, 60).
 *
 * @public
 */
export interface CompoundSpan {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/**
 * Split whole seconds into hours, minutes and seconds
 *
 * @public
 */
export function decomposeSeconds(totalSeconds: number): CompoundSpan {
  return {
    hours: Math.floor(totalSeconds / 3600),
    minutes: Math.floor((totalSeconds % 3600) / 60),
    seconds: totalSeconds % 60,
  };
}

/**
 * Human-readable length of time
 *
 * The concise form drops leading zero components ("5m 3s") but keeps those
 * after the first non-zero one ("1h 0m 0s"). The full form always lists
 * hours, minutes and seconds.
 *
 * @example
 * ```typescript
 * HumanTime.from(3661).concise(); // "1h 1m 1s"
 * HumanTime.from(3661).full();    // "1 hour 1 minute 1 second"
 * HumanTime.from(0).concise();    // "0s"
 * ```
 *
 * @public
 */
export class HumanTime extends HumanValue {
  private constructor(readonly totalSeconds: number) {
    super();
  }

  /**
   * Wrap a span given in seconds; fractions of a second are dropped
   *
   * @throws {@link InvalidInputError} For negative or non-finite spans
   */
  static from(seconds: number): HumanTime {
    const validated = parseInput(SpanLengthSchema, seconds, "seconds", "a non-negative number");
    return new HumanTime(Math.floor(validated));
  }

  /**
   * Wrap a span given in milliseconds; fractions of a second are dropped
   *
   * @throws {@link InvalidInputError} For negative or non-finite spans
   */
  static fromMilliseconds(milliseconds: number): HumanTime {
    const validated = parseInput(
      SpanLengthSchema,
      milliseconds,
      "milliseconds",
      "a non-negative number",
    );
    return new HumanTime(Math.floor(validated / 1000));
  }

  span(): CompoundSpan {
    return decomposeSeconds(this.totalSeconds);
  }

  format(format: OutputFormat): string {
    const { hours, minutes, seconds } = this.span();
    const [h, m, s] = [hours, minutes, seconds].map(toPlainString);

    if (format === OutputFormat.Full) {
      return [
        `${h} ${pluralize(hours, "hour")}`,
        `${m} ${pluralize(minutes, "minute")}`,
        `${s} ${pluralize(seconds, "second")}`,
      ].join(" ");
    }

    if (hours > 0) {
      return `${h}h ${m}m ${s}s`;
    }
    if (minutes > 0) {
      return `${m}m ${s}s`;
    }
    return `${s}s`;
  }
}
