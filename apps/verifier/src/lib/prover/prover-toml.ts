import {
  PUBLIC_RANGES,
  type PublicRanges,
  type VerificationInput,
} from "../verification/types.js";

/**
 * Serialize circuit inputs as the Prover.toml nargo reads.
 * Field elements are written as quoted decimal strings.
 */
export function toProverToml(
  input: VerificationInput,
  ranges: PublicRanges = PUBLIC_RANGES
): string {
  const entries: [string, number][] = [
    ["age", input.age],
    ["bmi", input.bmiTimesTen],
    ["min_age", ranges.minAge],
    ["max_age", ranges.maxAge],
    ["min_bmi", ranges.minBmi],
    ["max_bmi", ranges.maxBmi],
  ];

  return `${entries.map(([key, value]) => `${key} = "${value}"`).join("\n")}\n`;
}
