import { describe, expect, it } from "vitest";

import {
  createVerificationInput,
  describeValidationError,
  validateField,
} from "../input-validator.js";

describe("input validator", () => {
  describe("validateField", () => {
    it("accepts every age in the eligible range", () => {
      for (let age = 10; age <= 25; age++) {
        expect(validateField(`${age}\n`, "age")).toEqual({
          ok: true,
          value: age,
        });
      }
    });

    it("accepts the BMI bounds", () => {
      expect(validateField("185", "bmi")).toEqual({ ok: true, value: 185 });
      expect(validateField("249", "bmi")).toEqual({ ok: true, value: 249 });
    });

    it("trims surrounding whitespace and carriage returns", () => {
      expect(validateField("  20\r\n", "age")).toEqual({ ok: true, value: 20 });
    });

    it.each(["9", "26", "-5", "0"])("rejects out-of-range age %s", (raw) => {
      expect(validateField(raw, "age")).toEqual({
        ok: false,
        error: { kind: "out_of_range", min: 10, max: 25 },
      });
    });

    it.each(["184", "250"])("rejects out-of-range BMI %s", (raw) => {
      expect(validateField(raw, "bmi")).toEqual({
        ok: false,
        error: { kind: "out_of_range", min: 185, max: 249 },
      });
    });

    it.each(["abc", "20abc", "2 0", "20.5", "+20", "", "0x14", "1e1"])(
      "rejects non-integer input %j",
      (raw) => {
        expect(validateField(raw, "age")).toEqual({
          ok: false,
          error: { kind: "not_a_number" },
        });
      }
    );

    it("treats huge digit runs as out of range", () => {
      expect(validateField("99999999999999999999", "age")).toEqual({
        ok: false,
        error: { kind: "out_of_range", min: 10, max: 25 },
      });
    });
  });

  describe("describeValidationError", () => {
    it("describes a non-numeric age", () => {
      expect(describeValidationError({ kind: "not_a_number" }, "age")).toBe(
        "Invalid age: please enter a whole number."
      );
    });

    it("describes an out-of-range BMI", () => {
      expect(
        describeValidationError(
          { kind: "out_of_range", min: 185, max: 249 },
          "bmi"
        )
      ).toBe("BMI must be between 185 and 249.");
    });

    it("capitalizes the age label", () => {
      expect(
        describeValidationError({ kind: "out_of_range", min: 10, max: 25 }, "age")
      ).toBe("Age must be between 10 and 25.");
    });
  });

  describe("createVerificationInput", () => {
    it("returns a frozen input for valid fields", () => {
      const input = createVerificationInput(20, 220);
      expect(input).toEqual({ age: 20, bmiTimesTen: 220 });
      expect(Object.isFrozen(input)).toBe(true);
    });

    it("refuses out-of-range fields", () => {
      expect(() => createVerificationInput(9, 220)).toThrow(RangeError);
      expect(() => createVerificationInput(20, 250)).toThrow(RangeError);
    });
  });
});
