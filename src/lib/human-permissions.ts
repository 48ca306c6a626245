/**
 * @module human-permissions
 * File permission modes as text
 *
 * @public
 */

import {
  type ModeClassifier,
  type PermissionBits,
  posixModeClassifier,
} from "./mode-classifier.js";
import {
  type PermissionStyleSource,
  rendererFor,
  resolvePermissionStyle,
} from "./permission-renderers.js";
import { parseInput, type PermissionStyle, PermissionModeSchema } from "./schemas.js";

/**
 * Options for permission rendering
 *
 * @public
 */
export interface HumanPermissionsOptions extends PermissionStyleSource {
  /**
   * Classifier turning the raw mode into bits (defaults to POSIX)
   */
  classifier?: ModeClassifier;
}

/**
 * Human-readable file permissions
 *
 * The style is resolved once at construction: an explicit option, then
 * `HUMAN_UNITS_PERMISSION_STYLE`, then the platform.
 *
 * @example
 * ```typescript
 * HumanPermissions.from(0o40755, { style: "unix" }).toString();
 * // "drwxr-xr-x"
 * HumanPermissions.from(0o100640, { style: "descriptive" }).toString();
 * // "User: Read, Write; Group: Read; Other: None"
 * ```
 *
 * @public
 */
export class HumanPermissions {
  private constructor(
    readonly mode: number,
    readonly bits: PermissionBits,
    readonly style: PermissionStyle,
  ) {}

  /**
   * Classify a raw mode
   *
   * @param mode - Raw mode integer, e.g. `fs.Stats#mode`
   * @param options - Classifier and style overrides
   * @throws {@link InvalidInputError} For negative, fractional or over-wide modes
   * @throws {@link ConfigurationError} When the environment style override is invalid
   */
  static from(mode: number, options: HumanPermissionsOptions = {}): HumanPermissions {
    const validated = parseInput(
      PermissionModeSchema,
      mode,
      "mode",
      "a non-negative 32-bit whole number",
    );
    const classifier = options.classifier ?? posixModeClassifier;
    return new HumanPermissions(
      validated,
      classifier.classify(validated),
      resolvePermissionStyle(options),
    );
  }

  /**
   * Render as "drwxr-xr-x"
   */
  unix(): string {
    return rendererFor("unix").render(this.bits);
  }

  /**
   * Render as "User: Read, Write, Execute; Group: …; Other: …"
   */
  descriptive(): string {
    return rendererFor("descriptive").render(this.bits);
  }

  /**
   * Render in the resolved style
   */
  toString(): string {
    return rendererFor(this.style).render(this.bits);
  }
}
