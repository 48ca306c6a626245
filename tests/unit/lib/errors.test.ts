/**
 * Unit tests for the error hierarchy
 */

import { describe, expect, it } from "vitest";
import {
  BaseError,
  ConfigurationError,
  formatError,
  InvalidInputError,
  isBaseError,
} from "../../../src/lib/errors.js";

describe("Error System", () => {
  describe("InvalidInputError", () => {
    it("should carry the code and validation details", () => {
      const error = new InvalidInputError(
        "Invalid bytes: Byte count must not be negative",
        "bytes",
        -1,
        "a non-negative whole number",
      );

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(BaseError);
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error.name).toBe("InvalidInputError");
      expect(error.code).toBe("INVALID_INPUT");
      expect(error.message).toBe("Invalid bytes: Byte count must not be negative");
      expect(error.metadata).toEqual({
        field: "bytes",
        value: -1,
        expected: "a non-negative whole number",
      });
    });

    it("should merge additional metadata", () => {
      const error = new InvalidInputError("Invalid mode", "mode", 1.5, undefined, {
        platform: "linux",
      });

      expect(error.metadata.platform).toBe("linux");
      expect(error.metadata.field).toBe("mode");
    });
  });

  describe("ConfigurationError", () => {
    it("should carry the configuration key and value", () => {
      const error = new ConfigurationError(
        "HUMAN_UNITS_PERMISSION_STYLE must be one of: unix, descriptive",
        "HUMAN_UNITS_PERMISSION_STYLE",
        "octal",
      );

      expect(error.name).toBe("ConfigurationError");
      expect(error.code).toBe("CONFIGURATION_ERROR");
      expect(error.metadata).toEqual({
        configKey: "HUMAN_UNITS_PERMISSION_STYLE",
        actualValue: "octal",
      });
    });
  });

  describe("isBaseError", () => {
    it("should recognise library errors only", () => {
      expect(isBaseError(new InvalidInputError("bad"))).toBe(true);
      expect(isBaseError(new ConfigurationError("bad"))).toBe(true);
      expect(isBaseError(new Error("bad"))).toBe(false);
      expect(isBaseError("bad")).toBe(false);
    });
  });

  describe("formatError", () => {
    it("should prefix library errors with their code", () => {
      const error = new InvalidInputError("Invalid seconds: Duration must not be negative");

      expect(formatError(error)).toBe(
        "INVALID_INPUT: Invalid seconds: Duration must not be negative",
      );
    });

    it("should append defined metadata on request", () => {
      const error = new InvalidInputError("Invalid precision", "precision", 21);

      expect(formatError(error, true)).toBe(
        [
          "INVALID_INPUT: Invalid precision",
          "Details: {",
          '  "field": "precision",',
          '  "value": 21',
          "}",
        ].join("\n"),
      );
    });

    it("should encode bigint and non-finite metadata", () => {
      const error = new InvalidInputError("Invalid value", "value", -5n, undefined, {
        limit: Number.POSITIVE_INFINITY,
      });

      expect(formatError(error, true)).toBe(
        [
          "INVALID_INPUT: Invalid value",
          "Details: {",
          '  "field": "value",',
          '  "value": "-5",',
          '  "limit": "Infinity"',
          "}",
        ].join("\n"),
      );
    });

    it("should omit details when no metadata is defined", () => {
      expect(formatError(new ConfigurationError("Environment validation failed"), true)).toBe(
        "CONFIGURATION_ERROR: Environment validation failed",
      );
    });

    it("should fall back to the message or string form", () => {
      expect(formatError(new Error("plain failure"))).toBe("plain failure");
      expect(formatError("text failure")).toBe("text failure");
      expect(formatError(42)).toBe("42");
    });
  });
});
