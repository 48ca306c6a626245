/**
 * Zod schemas for input validation with TypeScript type inference
 *
 * Every formatter validates its raw input here at construction time, so the
 * rendering paths never see a value outside their domain.
 *
 */

import { z } from "zod";

import { ConfigurationError, InvalidInputError } from "./errors.js";
import { logger } from "./logger.js";

const validationLogger = logger.child({}, "validation");

/**
 * Largest permission mode accepted (an unsigned 32-bit `st_mode`)
 *
 * @internal
 */
const MAX_PERMISSION_MODE = 0xff_ff_ff_ff;

/**
 * Largest number of decimal digits a percentage may be rounded to
 *
 * @internal
 */
export const MAX_PERCENT_PRECISION = 20;

/**
 * Schema for a finite number
 *
 * @public
 */
export const FiniteNumberSchema = z.number().finite("Value must be a finite number");

/**
 * Schema for a magnitude to scale (number or bigint)
 *
 * @public
 */
export const MagnitudeSchema = z.union([FiniteNumberSchema, z.bigint()]);

/**
 * Schema for a byte count
 *
 * @public
 */
export const ByteCountSchema = z.union([
  z
    .number()
    .int("Byte count must be a whole number")
    .nonnegative("Byte count must not be negative"),
  z.bigint().nonnegative("Byte count must not be negative"),
]);

/**
 * Schema for a span length in seconds or milliseconds
 *
 * @public
 */
export const SpanLengthSchema = z
  .number()
  .finite("Duration must be a finite number")
  .nonnegative("Duration must not be negative");

/**
 * Schema for the value of a percentage
 *
 * NaN and infinities are accepted and render as a sentinel.
 *
 * @public
 */
export const PercentValueSchema = z.union([z.number(), z.nan()]);

/**
 * Schema for the number of decimal digits a percentage keeps
 *
 * @public
 */
export const PrecisionSchema = z
  .number()
  .int("Precision must be a whole number")
  .min(0, `Precision must be between 0 and ${MAX_PERCENT_PRECISION}`)
  .max(MAX_PERCENT_PRECISION, `Precision must be between 0 and ${MAX_PERCENT_PRECISION}`);

/**
 * Schema for a reference instant (Date or epoch milliseconds)
 *
 * @public
 */
export const InstantSchema = z
  .union([z.date(), z.number().finite("Timestamp must be a finite number")])
  .nullish();

/**
 * Schema for a raw file mode
 *
 * @public
 */
export const PermissionModeSchema = z
  .number()
  .int("Permission mode must be a whole number")
  .nonnegative("Permission mode must not be negative")
  .max(MAX_PERMISSION_MODE, "Permission mode must fit in 32 bits");

/**
 * Schema for the permission rendering style
 *
 * @public
 */
export const PermissionStyleSchema = z.enum(["unix", "descriptive"]);

/**
 * Environment validation schema
 *
 * @public
 */
export const EnvironmentSchema = z.object({
  /**
   * Node.js environment
   */
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),

  /**
   * Log level override
   */
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "SILENT"]).optional(),

  /**
   * Forces the permission rendering style regardless of platform
   */
  HUMAN_UNITS_PERMISSION_STYLE: PermissionStyleSchema.optional(),
});

/**
 * Inferred TypeScript types from schemas
 */

export type Magnitude = z.infer<typeof MagnitudeSchema>;
export type ByteCount = z.infer<typeof ByteCountSchema>;
export type Instant = NonNullable<z.infer<typeof InstantSchema>>;
export type PermissionStyle = z.infer<typeof PermissionStyleSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Safe parse with user-friendly error formatting
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validation result with formatted errors
 *
 * @public
 */
export function safeParseWithErrors<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate a formatter input, rejecting it with an InvalidInputError
 *
 * @param schema - Schema describing the accepted domain
 * @param value - Raw input
 * @param field - Input name used in the error
 * @param expected - Description of the accepted domain
 * @returns The validated value
 * @throws {@link InvalidInputError} When the value is outside the domain
 *
 * @public
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  field: string,
  expected: string,
): T {
  const result = safeParseWithErrors(schema, value);

  if (result.success) {
    return result.data;
  }

  validationLogger.debug("Rejected formatter input", { field, value, errors: result.errors });
  throw new InvalidInputError(
    `Invalid ${field}: ${result.errors.join("; ")}`,
    field,
    value,
    expected,
  );
}

/**
 * Validate and parse environment variables
 *
 * @param environment - Process environment object
 * @returns Parsed and validated environment configuration
 * @throws {@link ConfigurationError} When environment validation fails
 *
 * @public
 */
export function validateEnvironment(
  environment: Record<string, string | undefined> = process.env,
): Environment {
  const result = safeParseWithErrors(EnvironmentSchema, environment);

  if (!result.success) {
    throw new ConfigurationError(
      `Environment validation failed: ${result.errors.join("; ")}`,
      undefined,
      undefined,
      { errors: result.errors },
    );
  }

  return result.data;
}

/**
 * Read the permission style override from the environment
 *
 * Only `HUMAN_UNITS_PERMISSION_STYLE` is inspected, so unrelated settings
 * cannot break permission rendering.
 *
 * @param environment - Process environment object
 * @returns The configured style, or undefined when unset
 * @throws {@link ConfigurationError} When the setting is not a known style
 *
 * @public
 */
export function readPermissionStyle(
  environment: Record<string, string | undefined> = process.env,
): PermissionStyle | undefined {
  const value = environment.HUMAN_UNITS_PERMISSION_STYLE;
  if (value === undefined || value === "") {
    return undefined;
  }

  const result = PermissionStyleSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `HUMAN_UNITS_PERMISSION_STYLE must be one of: ${PermissionStyleSchema.options.join(", ")}`,
      "HUMAN_UNITS_PERMISSION_STYLE",
      value,
    );
  }

  return result.data;
}
