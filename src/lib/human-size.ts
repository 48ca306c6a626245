/**
 * @module human-size
 * Byte counts in binary (IEC) or decimal (SI) units
 *
 * @public
 */

import { HumanValue, OutputFormat, pluralize } from "./human-value.js";
import { type Ladder, powerLadder, renderScaledValue, scaleMagnitude } from "./scale-selector.js";
import { type ByteCount, ByteCountSchema, parseInput } from "./schemas.js";

/**
 * Unit system used to scale a byte count
 *
 * @public
 */
export enum UnitSystem {
  /**
   * IEC units, steps of 1024 (KiB, MiB, …)
   */
  Binary = "binary",

  /**
   * SI units, steps of 1000 (KB, MB, …)
   */
  Decimal = "decimal",
}

const LADDERS: Readonly<Record<UnitSystem, Ladder>> = Object.freeze({
  [UnitSystem.Binary]: powerLadder(
    1024,
    ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB", "YiB"],
    [
      "byte",
      "kibibyte",
      "mebibyte",
      "gibibyte",
      "tebibyte",
      "pebibyte",
      "exbibyte",
      "zebibyte",
      "yobibyte",
    ],
  ),
  [UnitSystem.Decimal]: powerLadder(
    1000,
    ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"],
    [
      "byte",
      "kilobyte",
      "megabyte",
      "gigabyte",
      "terabyte",
      "petabyte",
      "exabyte",
      "zettabyte",
      "yottabyte",
    ],
  ),
});

const SIZE_DIGITS = 1;

/**
 * Human-readable byte size
 *
 * The unit system is fixed per instance; `decimal()` and `binary()` return
 * new instances.
 *
 * @example
 * ```typescript
 * HumanSize.from(5_242_880).concise();           // "5 MiB"
 * HumanSize.from(5_242_880).full();              // "5 mebibytes"
 * HumanSize.from(5_000_000).decimal().concise(); // "5 MB"
 * HumanSize.from(1_500_000).concise();           // "1.4 MiB"
 * ```
 *
 * @public
 */
export class HumanSize extends HumanValue {
  private constructor(
    private readonly bytes: number,
    readonly system: UnitSystem,
  ) {
    super();
  }

  /**
   * Wrap a byte count
   *
   * @param bytes - Non-negative whole number of bytes
   * @param system - Unit system, binary by default
   * @throws {@link InvalidInputError} For negative, fractional or non-finite counts
   */
  static from(bytes: ByteCount, system: UnitSystem = UnitSystem.Binary): HumanSize {
    const validated = parseInput(ByteCountSchema, bytes, "bytes", "a non-negative whole number");
    return new HumanSize(Number(validated), system);
  }

  /**
   * Same byte count in SI units
   */
  decimal(): HumanSize {
    return new HumanSize(this.bytes, UnitSystem.Decimal);
  }

  /**
   * Same byte count in IEC units
   */
  binary(): HumanSize {
    return new HumanSize(this.bytes, UnitSystem.Binary);
  }

  get raw(): number {
    return this.bytes;
  }

  format(format: OutputFormat): string {
    const { unit, rounded } = scaleMagnitude(this.bytes, LADDERS[this.system], SIZE_DIGITS);
    const text = renderScaledValue(rounded, SIZE_DIGITS);

    if (format === OutputFormat.Concise) {
      return `${text} ${unit.symbol}`;
    }
    return `${text} ${pluralize(rounded, unit.word)}`;
  }
}
