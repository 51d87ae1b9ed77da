/**
 * Line protocol spoken with `nc`/`telnet` clients.
 */

import {
  FIELD_RANGES,
  type FieldKind,
  PUBLIC_RANGES,
  type ProofResult,
  type PublicRanges,
} from "../verification/types.js";

export const BANNER =
  "ZK Insurance Verifier Server\n============================\n";

export const PROMPTS: Record<FieldKind, string> = {
  age: `Enter age (${FIELD_RANGES.age.min}-${FIELD_RANGES.age.max}): `,
  bmi: `Enter BMI multiplied by 10 (${FIELD_RANGES.bmi.min}-${FIELD_RANGES.bmi.max}): `,
};

export const PROVING_NOTICE = "Generating proof...\n";

export const BUSY_MESSAGE = "Server is busy, please try again later.\n";

export const INPUT_TOO_LONG = "Input line too long.\n";

export const IDLE_TIMEOUT_NOTICE = "\nNo input received in time.\n";

export const FAREWELL =
  "\nConnection will close. Thanks for using ZK Insurance Verifier!\n";

const PROOF_PREVIEW_LENGTH = 50;

/**
 * JSON document sent to the client and optionally saved to disk.
 * Key names are part of the wire format that existing clients parse.
 */
export interface ProofDocument {
  proof: string;
  /** Base64 of the circuit's verification key, empty when none is deployed */
  verification_key: string;
  public_inputs: {
    min_age: number;
    max_age: number;
    min_bmi: number;
    max_bmi: number;
  };
  success: boolean;
  message: string;
}

function toPublicInputs(ranges: PublicRanges): ProofDocument["public_inputs"] {
  return {
    min_age: ranges.minAge,
    max_age: ranges.maxAge,
    min_bmi: ranges.minBmi,
    max_bmi: ranges.maxBmi,
  };
}

export function toProofDocument(result: ProofResult): ProofDocument {
  return {
    proof: result.artifact?.proofBase64 ?? "",
    verification_key: result.artifact?.verificationKeyBase64 ?? "",
    public_inputs: toPublicInputs(PUBLIC_RANGES),
    success: result.success,
    message: result.message,
  };
}

export function formatRetryPrompt(error: string, kind: FieldKind): string {
  return `${error}\n${PROMPTS[kind]}`;
}

function formatBmi(bmiTimesTen: number): string {
  return (bmiTimesTen / 10).toFixed(1);
}

/**
 * Render the final response. Only the fixed result message is included;
 * tool diagnostics stay in the logs.
 */
export function formatProofResponse(
  result: ProofResult,
  savedFile?: string
): string {
  let response = `\n=== PROOF RESPONSE ===\nSuccess: ${result.success}\nMessage: ${result.message}\n`;

  if (result.success && result.artifact) {
    const preview = result.artifact.proofBase64.slice(0, PROOF_PREVIEW_LENGTH);
    const { minAge, maxAge, minBmi, maxBmi } = PUBLIC_RANGES;
    const json = JSON.stringify(toProofDocument(result), null, 2);

    response += `\nProof (Base64): ${preview}...\n`;
    response += `\nAge Range: ${minAge} - ${maxAge}\nBMI Range: ${formatBmi(minBmi)} - ${formatBmi(maxBmi)}\n`;
    response += `\nFull JSON Response:\n${json}\n`;
    if (savedFile) {
      response += `Proof saved to: ${savedFile}\n`;
    }
  }

  return response + FAREWELL;
}
