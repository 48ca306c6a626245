/**
 * human-units - public entry point
 *
 * Converts counts, byte sizes, durations, timestamps, percentages and file
 * permission modes into short, human-readable strings, each in a concise
 * (symbol) and a full (word) style.
 *
 */

export { HumanValue, OutputFormat, pluralize, type HumanReadable } from "./lib/human-value.js";
export {
  type Ladder,
  powerLadder,
  renderScaledValue,
  roundHalfAwayFromZero,
  scaleMagnitude,
  type ScaledMagnitude,
  type ScaleUnit,
  selectScale,
  toPlainString,
} from "./lib/scale-selector.js";
export { groupDigits, HumanCount, HumanNumber } from "./lib/human-number.js";
export { HumanSize, UnitSystem } from "./lib/human-size.js";
export {
  bucketDuration,
  type DurationBucket,
  type DurationDirection,
  type DurationUnit,
  HumanDuration,
  type HumanDurationOptions,
} from "./lib/human-duration.js";
export { type CompoundSpan, decomposeSeconds, HumanTime } from "./lib/human-time.js";
export { HumanPercent } from "./lib/human-percent.js";
export {
  type FileType,
  type ModeClassifier,
  type PermissionBits,
  type PermissionTriplet,
  PosixModeClassifier,
  posixModeClassifier,
  type SpecialBits,
} from "./lib/mode-classifier.js";
export {
  DescriptivePermissionRenderer,
  listPrincipals,
  type PermissionRenderer,
  type PermissionStyleSource,
  type Principal,
  type PrincipalPermissions,
  rendererFor,
  resolvePermissionStyle,
  UnixPermissionRenderer,
} from "./lib/permission-renderers.js";
export { HumanPermissions, type HumanPermissionsOptions } from "./lib/human-permissions.js";
export {
  formatGrouped,
  formatNumber,
  formatPercent,
  formatPermissions,
  formatRelativeTime,
  formatSize,
  formatSpan,
  type FormatRelativeTimeOptions,
  type FormatSizeOptions,
} from "./lib/format-utilities.js";
export {
  BaseError,
  ConfigurationError,
  formatError,
  InvalidInputError,
  isBaseError,
} from "./lib/errors.js";
export {
  type ByteCount,
  type Environment,
  type Instant,
  type Magnitude,
  type PermissionStyle,
  readPermissionStyle,
  validateEnvironment,
} from "./lib/schemas.js";
export { Logger, logger, LogLevel, type LogEntry, type LoggerOptions } from "./lib/logger.js";
