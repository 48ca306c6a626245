/**
 * @module scale-selector
 * Unit selection and rounding shared by the magnitude formatters
 *
 * A ladder is an ascending list of units; a magnitude is expressed in the
 * largest unit whose threshold it reaches, then rounded for display. When
 * rounding carries the value up to the next unit (999 999 is "1000K" at one
 * decimal) the next unit is used instead ("1M").
 *
 * @public
 */

/**
 * One rung of a unit ladder
 *
 * @public
 */
export interface ScaleUnit {
  /**
   * Smallest absolute magnitude expressed in this unit
   */
  readonly threshold: number;

  /**
   * Value of one unit in base units
   */
  readonly divisor: number;

  /**
   * Concise suffix, e.g. "K" or "MiB" (empty for a bare base unit)
   */
  readonly symbol: string;

  /**
   * Singular word, e.g. "thousand" or "mebibyte" (empty for a bare base unit)
   */
  readonly word: string;
}

/**
 * Units ordered ascending by threshold
 *
 * @public
 */
export type Ladder = readonly ScaleUnit[];

/**
 * A magnitude expressed in its chosen unit
 *
 * @public
 */
export interface ScaledMagnitude {
  readonly raw: number;
  readonly unitIndex: number;
  readonly unit: ScaleUnit;

  /**
   * `raw / unit.divisor`, unrounded
   */
  readonly scaled: number;

  /**
   * `scaled` rounded half away from zero for display
   */
  readonly rounded: number;
}

/**
 * Build a ladder whose rungs are successive powers of `step`
 *
 * The first rung is the base unit (divisor 1) and matches every magnitude.
 *
 * @param step - Ratio between neighbouring units, e.g. 1000 or 1024
 * @param symbols - Concise suffix per rung
 * @param words - Singular word per rung
 *
 * @public
 */
export function powerLadder(
  step: number,
  symbols: readonly string[],
  words: readonly string[],
): Ladder {
  return Object.freeze(
    symbols.map((symbol, index) =>
      Object.freeze({
        threshold: index === 0 ? 0 : step ** index,
        divisor: step ** index,
        symbol,
        word: words[index] ?? symbol,
      }),
    ),
  );
}

/**
 * Pick the unit a magnitude is expressed in
 *
 * Returns the index of the last rung whose threshold does not exceed
 * `|magnitude|`, or 0 when the magnitude is below every threshold. The sign
 * plays no part in the choice.
 *
 * @param magnitude - Value to place on the ladder
 * @param ladder - Units ordered ascending by threshold
 * @throws RangeError when the ladder is empty
 *
 * @public
 */
export function selectScale(magnitude: number, ladder: Ladder): number {
  if (ladder.length === 0) {
    throw new RangeError("A scale ladder needs at least one unit");
  }

  const absolute = Math.abs(magnitude);
  let unitIndex = 0;
  for (const [index, unit] of ladder.entries()) {
    if (unit.threshold <= absolute) {
      unitIndex = index;
    }
  }
  return unitIndex;
}

/**
 * Express a magnitude in its unit and round it for display
 *
 * @param magnitude - Value to scale
 * @param ladder - Units ordered ascending by threshold
 * @param digits - Decimal digits kept when rounding
 *
 * @example
 * ```typescript
 * const ladder = powerLadder(1000, ["", "K", "M"], ["", "thousand", "million"]);
 * scaleMagnitude(1_250, ladder).rounded;   // 1.3
 * scaleMagnitude(999_999, ladder).unit;    // the "M" rung, rounded 1
 * ```
 *
 * @public
 */
export function scaleMagnitude(magnitude: number, ladder: Ladder, digits = 1): ScaledMagnitude {
  let unitIndex = selectScale(magnitude, ladder);
  let unit = ladder[unitIndex];
  let scaled = magnitude / unit.divisor;
  let rounded = roundHalfAwayFromZero(scaled, digits);

  while (unitIndex < ladder.length - 1) {
    const next = ladder[unitIndex + 1];
    if (Math.abs(rounded) * unit.divisor < next.threshold) {
      break;
    }
    unitIndex += 1;
    unit = next;
    scaled = magnitude / unit.divisor;
    rounded = roundHalfAwayFromZero(scaled, digits);
  }

  return { raw: magnitude, unitIndex, unit, scaled, rounded };
}

/**
 * Round to a number of decimal digits, halves away from zero
 *
 * `Math.round` sends -2.5 to -2; this sends it to -3, matching 2.5 → 3.
 * A value too large to scale by `10 ** digits` is already exact at that
 * precision and is returned unchanged.
 *
 * @param value - Value to round
 * @param digits - Decimal digits to keep
 *
 * @public
 */
export function roundHalfAwayFromZero(value: number, digits: number): number {
  const factor = 10 ** digits;
  const shifted = Math.abs(value) * factor;
  if (!Number.isFinite(shifted)) {
    return value;
  }
  return (Math.sign(value) * Math.round(shifted)) / factor;
}

/**
 * Render a rounded value: integers bare, others with a fixed digit count
 *
 * @example
 * ```typescript
 * renderScaledValue(5);    // "5"
 * renderScaledValue(1.2);  // "1.2"
 * renderScaledValue(-0);   // "0"
 * ```
 *
 * @public
 */
export function renderScaledValue(value: number, digits = 1): string {
  if (Number.isInteger(value)) {
    return toPlainString(value);
  }
  return value.toFixed(digits);
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest decimal form of a number, written out without exponent notation
 *
 * `String` switches to exponents below 1e-6 and from 1e21 up; this keeps the
 * same significant digits and spells out the zeros instead. NaN and the
 * infinities pass through as `String` renders them.
 *
 * @example
 * ```typescript
 * toPlainString(1e-7);  // "0.0000001"
 * toPlainString(1e21);  // "1000000000000000000000"
 * toPlainString(12.5);  // "12.5"
 * ```
 *
 * @public
 */
export function toPlainString(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction = "", exponentText] = match;
  const exponent = Number(exponentText);
  const digits = `${lead}${fraction}`;

  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }
  return `${sign}${digits.padEnd(exponent + 1, "0")}`;
}
