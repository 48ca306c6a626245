/**
 * Output styles shared by every formatter
 *
 * Provides the Strategy-style base class the value wrappers extend: each
 * wrapper implements one `format` method and inherits the concise and full
 * renderings from it.
 *
 * @file Common rendering contract for value wrappers
 */

/**
 * Rendering style for a formatted value
 *
 * @public
 */
export enum OutputFormat {
  /**
   * Symbol-based rendering, e.g. "1.2K" or "5 MiB"
   */
  Concise = "concise",

  /**
   * Word-based rendering, e.g. "1.2 thousand" or "5 mebibytes"
   */
  Full = "full",
}

/**
 * A value that renders in both output styles
 *
 * @public
 */
export interface HumanReadable {
  concise(): string;
  full(): string;
  toString(): string;
}

/**
 * Base class for immutable value wrappers
 *
 * `toString()` renders the full form, so wrappers read naturally inside
 * template literals.
 *
 * @public
 */
export abstract class HumanValue implements HumanReadable {
  /**
   * Render using symbols
   */
  concise(): string {
    return this.format(OutputFormat.Concise);
  }

  /**
   * Render using words
   */
  full(): string {
    return this.format(OutputFormat.Full);
  }

  toString(): string {
    return this.full();
  }

  /**
   * Render the wrapped value in the given style
   */
  abstract format(format: OutputFormat): string;
}

/**
 * Choose the singular or plural form of a unit word
 *
 * @param count - Rendered quantity
 * @param singular - Word used when the quantity is exactly one
 * @param plural - Word used otherwise (defaults to `singular + "s"`)
 *
 * @public
 */
export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return count === 1 ? singular : plural;
}
