/**
 * Unit tests for ladder selection and rounding
 */

import { describe, expect, it } from "vitest";
import { NUMBER_LADDER } from "../../../src/lib/human-number.js";
import {
  powerLadder,
  renderScaledValue,
  roundHalfAwayFromZero,
  scaleMagnitude,
  selectScale,
  toPlainString,
} from "../../../src/lib/scale-selector.js";

const BINARY = powerLadder(1024, ["B", "KiB", "MiB"], ["byte", "kibibyte", "mebibyte"]);

describe("Scale Selector", () => {
  describe("powerLadder", () => {
    it("should build rungs from successive powers", () => {
      const ladder = powerLadder(1000, ["", "K", "M"], ["", "thousand", "million"]);

      expect(ladder.map((unit) => unit.threshold)).toEqual([0, 1000, 1_000_000]);
      expect(ladder.map((unit) => unit.divisor)).toEqual([1, 1000, 1_000_000]);
      expect(ladder[2]).toEqual({
        threshold: 1_000_000,
        divisor: 1_000_000,
        symbol: "M",
        word: "million",
      });
    });

    it("should freeze the ladder and its rungs", () => {
      expect(Object.isFrozen(BINARY)).toBe(true);
      expect(Object.isFrozen(BINARY[1])).toBe(true);
    });
  });

  describe("selectScale", () => {
    it("should use the base unit below the first threshold", () => {
      expect(selectScale(0, NUMBER_LADDER)).toBe(0);
      expect(selectScale(999, NUMBER_LADDER)).toBe(0);
      expect(selectScale(0.25, NUMBER_LADDER)).toBe(0);
    });

    it("should pick the largest unit whose threshold is reached", () => {
      expect(selectScale(1000, NUMBER_LADDER)).toBe(1);
      expect(selectScale(999_999, NUMBER_LADDER)).toBe(1);
      expect(selectScale(1_000_000, NUMBER_LADDER)).toBe(2);
      expect(selectScale(2_500_000_000, NUMBER_LADDER)).toBe(3);
      expect(selectScale(1e12, NUMBER_LADDER)).toBe(4);
    });

    it("should ignore the sign when choosing a unit", () => {
      expect(selectScale(-2500, NUMBER_LADDER)).toBe(1);
      expect(selectScale(-12, NUMBER_LADDER)).toBe(0);
    });

    it("should reject an empty ladder", () => {
      expect(() => selectScale(1, [])).toThrow(RangeError);
    });
  });

  describe("scaleMagnitude", () => {
    it("should scale and round to one digit", () => {
      const result = scaleMagnitude(1_250, NUMBER_LADDER);

      expect(result.unit.symbol).toBe("K");
      expect(result.scaled).toBe(1.25);
      expect(result.rounded).toBe(1.3);
    });

    it("should keep the sign on the scaled value", () => {
      const result = scaleMagnitude(-1_250, NUMBER_LADDER);

      expect(result.unit.symbol).toBe("K");
      expect(result.rounded).toBe(-1.3);
    });

    it("should keep scaled equal to raw over the divisor", () => {
      for (const value of [0, 7, 1_234, 56_789_000, 3.5e12]) {
        const result = scaleMagnitude(value, NUMBER_LADDER);
        expect(result.raw).toBe(value);
        expect(result.scaled).toBe(value / result.unit.divisor);
      }
    });

    it("should move to the next unit when rounding reaches it", () => {
      const result = scaleMagnitude(999_999, NUMBER_LADDER);

      expect(result.unitIndex).toBe(2);
      expect(result.unit.symbol).toBe("M");
      expect(result.rounded).toBe(1);
    });

    it("should promote out of the base unit", () => {
      const result = scaleMagnitude(999.96, NUMBER_LADDER);

      expect(result.unit.symbol).toBe("K");
      expect(result.rounded).toBe(1);
    });

    it("should promote on binary ladders", () => {
      const result = scaleMagnitude(1_048_575, BINARY);

      expect(result.unit.symbol).toBe("MiB");
      expect(result.rounded).toBe(1);
    });

    it("should stay on the last rung however large the value", () => {
      const result = scaleMagnitude(1024 ** 4, BINARY);

      expect(result.unit.symbol).toBe("MiB");
      expect(result.rounded).toBe(1_048_576);
    });
  });

  describe("roundHalfAwayFromZero", () => {
    it("should round halves away from zero in both directions", () => {
      expect(roundHalfAwayFromZero(2.5, 0)).toBe(3);
      expect(roundHalfAwayFromZero(-2.5, 0)).toBe(-3);
      expect(roundHalfAwayFromZero(1.25, 1)).toBe(1.3);
      expect(roundHalfAwayFromZero(-1.25, 1)).toBe(-1.3);
    });

    it("should keep the requested number of digits", () => {
      expect(roundHalfAwayFromZero(12.3456, 0)).toBe(12);
      expect(roundHalfAwayFromZero(12.3456, 1)).toBe(12.3);
      expect(roundHalfAwayFromZero(12.3456, 2)).toBe(12.35);
    });

    it("should return values too large to shift unchanged", () => {
      expect(roundHalfAwayFromZero(1e300, 20)).toBe(1e300);
    });

    it("should pass NaN through", () => {
      expect(roundHalfAwayFromZero(Number.NaN, 1)).toBeNaN();
    });
  });

  describe("renderScaledValue", () => {
    it("should render integers without decimals", () => {
      expect(renderScaledValue(5)).toBe("5");
      expect(renderScaledValue(1024)).toBe("1024");
    });

    it("should render other values with a fixed digit count", () => {
      expect(renderScaledValue(1.2)).toBe("1.2");
      expect(renderScaledValue(-1.5)).toBe("-1.5");
      expect(renderScaledValue(1.25, 2)).toBe("1.25");
    });

    it("should render negative zero as zero", () => {
      expect(renderScaledValue(-0)).toBe("0");
    });

    it("should write out integers of 1e21 and above in full", () => {
      expect(renderScaledValue(1e21)).toBe("1000000000000000000000");
      expect(renderScaledValue(-2.5e22)).toBe("-25000000000000000000000");
    });
  });

  describe("toPlainString", () => {
    it("should leave ordinary numbers as String renders them", () => {
      expect(toPlainString(12.5)).toBe("12.5");
      expect(toPlainString(-42)).toBe("-42");
      expect(toPlainString(0.000001)).toBe("0.000001");
    });

    it("should spell out small fractions", () => {
      expect(toPlainString(1e-7)).toBe("0.0000001");
      expect(toPlainString(1.5e-7)).toBe("0.00000015");
      expect(toPlainString(-2.25e-9)).toBe("-0.00000000225");
    });

    it("should spell out large integers", () => {
      expect(toPlainString(1e21)).toBe("1000000000000000000000");
      expect(toPlainString(1.234e22)).toBe("12340000000000000000000");
    });

    it("should pass non-finite values through", () => {
      expect(toPlainString(Number.NaN)).toBe("NaN");
      expect(toPlainString(Number.NEGATIVE_INFINITY)).toBe("-Infinity");
    });
  });
});
