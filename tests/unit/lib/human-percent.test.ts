/**
 * Unit tests for percentage rendering
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { InvalidInputError } from "../../../src/lib/errors.js";
import { HumanPercent } from "../../../src/lib/human-percent.js";

describe("HumanPercent", () => {
  describe("rounding", () => {
    it("should round to the requested precision", () => {
      expect(HumanPercent.from(12.3456, 1).concise()).toBe("12.3%");
      expect(HumanPercent.from(12.3456, 2).full()).toBe("12.35 percent");
    });

    it("should default to whole percentages", () => {
      const percent = HumanPercent.from(12.3456);

      expect(percent.precision).toBe(0);
      expect(percent.concise()).toBe("12%");
      expect(percent.full()).toBe("12 percent");
    });

    it("should not pad trailing zeros", () => {
      expect(HumanPercent.from(12.3, 2).concise()).toBe("12.3%");
      expect(HumanPercent.from(50, 3).concise()).toBe("50%");
    });

    it("should round halves away from zero", () => {
      expect(HumanPercent.from(2.5).concise()).toBe("3%");
      expect(HumanPercent.from(-2.5).concise()).toBe("-3%");
      expect(HumanPercent.from(-2.5).rounded).toBe(-3);
    });

    it("should render tiny values at high precision as plain decimals", () => {
      expect(HumanPercent.from(0.0000001, 7).concise()).toBe("0.0000001%");
      expect(HumanPercent.from(0.00000015, 8).full()).toBe("0.00000015 percent");
      expect(HumanPercent.from(-0.0000005, 7).concise()).toBe("-0.0000005%");
      expect(HumanPercent.from(0.0000001).concise()).toBe("0%");
      expect(HumanPercent.from(-0.4).concise()).toBe("0%");
    });

    it("should render huge values as plain integers", () => {
      expect(HumanPercent.from(1e21).concise()).toBe("1000000000000000000000%");
      expect(HumanPercent.from(2e25).full()).toBe("20000000000000000000000000 percent");
    });

    it("should not bound the value", () => {
      expect(HumanPercent.from(150).concise()).toBe("150%");
      expect(HumanPercent.from(-20).full()).toBe("-20 percent");
    });
  });

  describe("non-finite values", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should render NaN and infinities as a placeholder", () => {
      expect(HumanPercent.from(Number.NaN).concise()).toBe("-");
      expect(HumanPercent.from(Number.NaN, 2).full()).toBe("-");
      expect(HumanPercent.from(Number.POSITIVE_INFINITY).concise()).toBe("-");
      expect(HumanPercent.from(Number.NEGATIVE_INFINITY).full()).toBe("-");
    });

    it("should stay silent at the default log level", () => {
      const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});

      HumanPercent.from(Number.NaN).concise();

      expect(debugSpy).not.toHaveBeenCalled();
    });
  });

  describe("validation", () => {
    it("should reject precision outside 0 to 20", () => {
      expect(() => HumanPercent.from(10, -1)).toThrow(InvalidInputError);
      expect(() => HumanPercent.from(10, -1)).toThrow(
        "Invalid precision: Precision must be between 0 and 20",
      );
      expect(() => HumanPercent.from(10, 21)).toThrow("Precision must be between 0 and 20");
    });

    it("should reject fractional precision", () => {
      expect(() => HumanPercent.from(10, 1.5)).toThrow("Precision must be a whole number");
    });

    it("should accept the precision bounds", () => {
      expect(HumanPercent.from(10, 0).concise()).toBe("10%");
      expect(HumanPercent.from(10, 20).concise()).toBe("10%");
    });
  });
});
