import {
  FIELD_RANGES,
  type FieldKind,
  type VerificationInput,
} from "./types.js";

/** Optional sign followed by base-10 digits, nothing else */
const INTEGER_PATTERN = /^-?\d+$/;

export type ValidationError =
  | { kind: "not_a_number" }
  | { kind: "out_of_range"; min: number; max: number };

export type ValidationResult =
  | { ok: true; value: number }
  | { ok: false; error: ValidationError };

const FIELD_LABELS: Record<FieldKind, string> = {
  age: "age",
  bmi: "BMI",
};

/**
 * Parse and range-check one client line.
 * Rejections are values: the protocol layer re-prompts on them.
 */
export function validateField(
  rawLine: string,
  kind: FieldKind
): ValidationResult {
  const trimmed = rawLine.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, error: { kind: "not_a_number" } };
  }

  const value = Number.parseInt(trimmed, 10);
  const { min, max } = FIELD_RANGES[kind];
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    return { ok: false, error: { kind: "out_of_range", min, max } };
  }

  return { ok: true, value };
}

export function describeValidationError(
  error: ValidationError,
  kind: FieldKind
): string {
  const label = FIELD_LABELS[kind];
  if (error.kind === "not_a_number") {
    return `Invalid ${label}: please enter a whole number.`;
  }
  const capitalized = label.charAt(0).toUpperCase() + label.slice(1);
  return `${capitalized} must be between ${error.min} and ${error.max}.`;
}

function isWithin(kind: FieldKind, value: number): boolean {
  const { min, max } = FIELD_RANGES[kind];
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Build a VerificationInput from already-validated fields.
 * Throws rather than produce a partially valid instance.
 */
export function createVerificationInput(
  age: number,
  bmiTimesTen: number
): VerificationInput {
  if (!isWithin("age", age)) {
    throw new RangeError(`age ${age} is outside the eligible range`);
  }
  if (!isWithin("bmi", bmiTimesTen)) {
    throw new RangeError(`bmi ${bmiTimesTen} is outside the eligible range`);
  }
  return Object.freeze({ age, bmiTimesTen });
}
