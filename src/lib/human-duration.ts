/**
 * @module human-duration
 * Time elapsed since, or remaining until, a reference instant
 *
 * The distance to the reference is placed in the coarsest bucket whose limit
 * it stays under and counted with floor division, so 75 seconds is "1m ago",
 * never "2m ago".
 *
 * @public
 */

import { HumanValue, OutputFormat, pluralize } from "./human-value.js";
import { type Instant, InstantSchema, parseInput } from "./schemas.js";

/**
 * Unit a relative duration is counted in
 *
 * @public
 */
export type DurationUnit = "second" | "minute" | "hour" | "day" | "week" | "month" | "year";

/**
 * Whether the reference lies before or after now
 *
 * @public
 */
export type DurationDirection = "past" | "future";

/**
 * Classification of the distance between now and the reference
 *
 * @public
 */
export type DurationBucket =
  | { readonly kind: "just-now" }
  | {
      readonly kind: "elapsed";
      readonly unit: DurationUnit;
      readonly count: number;
      readonly direction: DurationDirection;
    };

/**
 * Options for relative duration rendering
 *
 * @public
 */
export interface HumanDurationOptions {
  /**
   * Clock consulted at render time (defaults to the system clock)
   */
  now?: () => Date;
}

interface BucketRule {
  /**
   * Exclusive upper bound in seconds
   */
  readonly limit: number;
  readonly seconds: number;
  readonly unit: DurationUnit;
}

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;
const MONTH = 30 * DAY;
const YEAR = 365 * DAY;

const BUCKET_RULES: readonly BucketRule[] = [
  { limit: MINUTE, seconds: 1, unit: "second" },
  { limit: HOUR, seconds: MINUTE, unit: "minute" },
  { limit: DAY, seconds: HOUR, unit: "hour" },
  { limit: WEEK, seconds: DAY, unit: "day" },
  { limit: MONTH, seconds: WEEK, unit: "week" },
  { limit: YEAR, seconds: MONTH, unit: "month" },
  { limit: Number.POSITIVE_INFINITY, seconds: YEAR, unit: "year" },
];

const UNIT_SYMBOLS: Readonly<Record<DurationUnit, string>> = {
  second: "s",
  minute: "m",
  hour: "h",
  day: "d",
  week: "w",
  month: "mo",
  year: "y",
};

/**
 * Rendered when there is no reference instant
 *
 * @internal
 */
const ABSENT = { [OutputFormat.Concise]: "-", [OutputFormat.Full]: "never" } as const;

/**
 * Classify a signed distance in whole seconds
 *
 * @param deltaSeconds - `now - reference`; positive values lie in the past
 *
 * @public
 */
export function bucketDuration(deltaSeconds: number): DurationBucket {
  const distance = Math.abs(deltaSeconds);
  if (distance < 1) {
    return { kind: "just-now" };
  }

  const direction: DurationDirection = deltaSeconds > 0 ? "past" : "future";
  const rule = BUCKET_RULES.find((candidate) => distance < candidate.limit) ?? BUCKET_RULES[0];

  return {
    kind: "elapsed",
    unit: rule.unit,
    count: Math.floor(distance / rule.seconds),
    direction,
  };
}

/**
 * Human-readable distance to a reference instant
 *
 * @example
 * ```typescript
 * const now = () => new Date("2025-01-10T12:00:00Z");
 * HumanDuration.from(new Date("2025-01-10T11:58:45Z"), { now }).concise(); // "1m ago"
 * HumanDuration.from(new Date("2025-01-09T12:00:00Z"), { now }).full();    // "yesterday"
 * HumanDuration.from(undefined).concise();                                 // "-"
 * ```
 *
 * @public
 */
export class HumanDuration extends HumanValue {
  private constructor(
    private readonly referenceMs: number | undefined,
    private readonly now: () => Date,
  ) {
    super();
  }

  /**
   * Wrap an optional reference instant
   *
   * @param reference - Date or epoch milliseconds; absent renders a sentinel
   * @param options - Clock override
   * @throws {@link InvalidInputError} For an invalid Date or non-finite timestamp
   */
  static from(reference?: Instant | null, options: HumanDurationOptions = {}): HumanDuration {
    const validated = parseInput(
      InstantSchema,
      reference,
      "reference",
      "a valid Date, epoch milliseconds, or nothing",
    );
    const referenceMs = validated instanceof Date ? validated.getTime() : (validated ?? undefined);
    return new HumanDuration(referenceMs, options.now ?? (() => new Date()));
  }

  /**
   * Whether a reference instant was supplied
   */
  get hasReference(): boolean {
    return this.referenceMs !== undefined;
  }

  /**
   * Classify the distance to the reference against the current clock
   *
   * @returns The bucket, or undefined when there is no reference
   */
  bucket(): DurationBucket | undefined {
    if (this.referenceMs === undefined) {
      return undefined;
    }
    const deltaSeconds = Math.trunc((this.now().getTime() - this.referenceMs) / 1000);
    return bucketDuration(deltaSeconds);
  }

  format(format: OutputFormat): string {
    const bucket = this.bucket();
    if (bucket === undefined) {
      return ABSENT[format];
    }
    if (bucket.kind === "just-now") {
      return "just now";
    }

    const { unit, count, direction } = bucket;
    const relation = direction === "past" ? "ago" : "from now";

    if (format === OutputFormat.Concise) {
      return `${count}${UNIT_SYMBOLS[unit]} ${relation}`;
    }
    if (unit === "day" && count === 1) {
      return direction === "past" ? "yesterday" : "tomorrow";
    }
    return `${count} ${pluralize(count, unit)} ${relation}`;
  }
}
