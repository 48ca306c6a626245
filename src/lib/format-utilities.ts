/**
 * @module format-utils
 * One-call formatting functions
 *
 * Thin wrappers over the value classes for callers that only need a string.
 * Every function defaults to the concise style.
 *
 * @public
 */

import { HumanDuration } from "./human-duration.js";
import { HumanNumber } from "./human-number.js";
import { HumanPercent } from "./human-percent.js";
import { HumanPermissions, type HumanPermissionsOptions } from "./human-permissions.js";
import { HumanSize, UnitSystem } from "./human-size.js";
import { HumanTime } from "./human-time.js";
import { OutputFormat } from "./human-value.js";
import type { ByteCount, Instant, Magnitude } from "./schemas.js";

export { groupDigits } from "./human-number.js";

/**
 * Options for {@link formatSize}
 *
 * @public
 */
export interface FormatSizeOptions {
  system?: UnitSystem;
  format?: OutputFormat;
}

/**
 * Options for {@link formatRelativeTime}
 *
 * @public
 */
export interface FormatRelativeTimeOptions {
  format?: OutputFormat;
  now?: () => Date;
}

/**
 * Format a count with K/M/B/T suffixes
 *
 * @example
 * ```typescript
 * formatNumber(2_500_000_000);                    // "2.5B"
 * formatNumber(1_200, OutputFormat.Full);         // "1.2 thousand"
 * ```
 *
 * @public
 */
export function formatNumber(value: Magnitude, format = OutputFormat.Concise): string {
  return HumanNumber.from(value).format(format);
}

/**
 * Format a byte count
 *
 * @example
 * ```typescript
 * formatSize(5_242_880);                                  // "5 MiB"
 * formatSize(5_000_000, { system: UnitSystem.Decimal });  // "5 MB"
 * ```
 *
 * @public
 */
export function formatSize(bytes: ByteCount, options: FormatSizeOptions = {}): string {
  return HumanSize.from(bytes, options.system ?? UnitSystem.Binary).format(
    options.format ?? OutputFormat.Concise,
  );
}

/**
 * Format the distance to a reference instant, e.g. "2h ago"
 *
 * @public
 */
export function formatRelativeTime(
  reference: Instant | null | undefined,
  options: FormatRelativeTimeOptions = {},
): string {
  return HumanDuration.from(reference, { now: options.now }).format(
    options.format ?? OutputFormat.Concise,
  );
}

/**
 * Format a span of seconds, e.g. "1h 1m 1s"
 *
 * @public
 */
export function formatSpan(seconds: number, format = OutputFormat.Concise): string {
  return HumanTime.from(seconds).format(format);
}

/**
 * Format a percentage, e.g. "12.3%"
 *
 * @public
 */
export function formatPercent(
  value: number,
  precision = 0,
  format = OutputFormat.Concise,
): string {
  return HumanPercent.from(value, precision).format(format);
}

/**
 * Format a raw file mode in the resolved permission style
 *
 * @public
 */
export function formatPermissions(mode: number, options: HumanPermissionsOptions = {}): string {
  return HumanPermissions.from(mode, options).toString();
}

/**
 * Format a count with thousands separators, e.g. "1,234,567"
 *
 * @public
 */
export function formatGrouped(value: Magnitude): string {
  return HumanNumber.from(value).grouped();
}
