/**
 * Shared types for insurance eligibility proofs.
 *
 * PRIVACY: age and BMI never leave the session that read them. Only the
 * proof artifact and the public range bounds are returned to the client.
 */

export type FieldKind = "age" | "bmi";

export interface FieldRange {
  min: number;
  max: number;
}

export const FIELD_RANGES: Readonly<Record<FieldKind, FieldRange>> = {
  age: { min: 10, max: 25 },
  // BMI multiplied by 10 (18.5 - 24.9) to keep circuit inputs integral
  bmi: { min: 185, max: 249 },
};

/**
 * Public inputs of the eligibility circuit.
 */
export interface PublicRanges {
  minAge: number;
  maxAge: number;
  minBmi: number;
  maxBmi: number;
}

export const PUBLIC_RANGES: PublicRanges = {
  minAge: FIELD_RANGES.age.min,
  maxAge: FIELD_RANGES.age.max,
  minBmi: FIELD_RANGES.bmi.min,
  maxBmi: FIELD_RANGES.bmi.max,
};

export interface VerificationInput {
  readonly age: number;
  readonly bmiTimesTen: number;
}

export interface ProofRequest {
  /** Namespaces the working area of this request */
  sessionId: string;
  input: VerificationInput;
}

export type StageName = "witness" | "prove";

export interface StageOutcome {
  stage: StageName;
  /** null when the process never started or was killed by a signal */
  exitStatus: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** errno code when the executable could not be spawned (ENOENT, EACCES) */
  spawnErrorCode?: string;
  timedOut: boolean;
  cancelled: boolean;
}

export interface ProofArtifact {
  proofBase64: string;
  byteLength: number;
  /** Present when the circuit project ships `target/vk` */
  verificationKeyBase64?: string;
}

export interface ProofResult {
  success: boolean;
  message: string;
  /** Tool diagnostics. Logged, never written to the client. */
  rawDetail?: string;
  artifact?: ProofArtifact;
}

export type OutcomeCategory =
  | "success"
  | "constraint_failure"
  | "prove_failure"
  | "environment"
  | "timeout"
  | "cancelled"
  | "internal";
