/**
 * Turns captured tool outcomes into the client-facing proof result.
 *
 * Three situations must stay apart: a broken deployment (missing binary or
 * circuit), a tool that ran and refused the inputs, and success. Tool
 * output is kept in rawDetail for the logs; client messages come from a
 * fixed set so paths and internals never reach the socket.
 */

import { ProverError } from "../errors.js";
import { sanitizeToolOutput } from "../logging/index.js";
import type {
  OutcomeCategory,
  ProofArtifact,
  ProofResult,
  StageOutcome,
} from "../verification/types.js";

export const PROOF_MESSAGES = {
  success:
    "Proof generated successfully! The user is eligible for insurance discount.",
  constraint_failure:
    "Circuit execution failed. The inputs do not satisfy the eligibility constraints.",
  prove_failure: "Proof generation failed.",
  environment: "Proof service is unavailable. Please try again later.",
  timeout: "Proof generation timed out. Please try again later.",
  cancelled: "Proof generation was cancelled.",
  internal: "Proof generation failed due to an internal error.",
} as const satisfies Record<OutcomeCategory, string>;

/** Shell conventions for "not executable" and "not found" */
const ENVIRONMENT_EXIT_STATUSES = new Set([126, 127]);

export interface InterpretedOutcome {
  category: OutcomeCategory;
  result: ProofResult;
}

function failure(
  category: Exclude<OutcomeCategory, "success">,
  rawDetail?: string
): InterpretedOutcome {
  return {
    category,
    result: {
      success: false,
      message: PROOF_MESSAGES[category],
      ...(rawDetail ? { rawDetail } : {}),
    },
  };
}

function describeOutput(outcome: StageOutcome): string | undefined {
  const output = outcome.stderr.trim() ? outcome.stderr : outcome.stdout;
  const detail = sanitizeToolOutput(output);
  return detail || undefined;
}

export function isStageSuccess(outcome: StageOutcome): boolean {
  return (
    outcome.exitStatus === 0 &&
    !outcome.timedOut &&
    !outcome.cancelled &&
    outcome.spawnErrorCode === undefined
  );
}

function classifyFailure(outcome: StageOutcome): InterpretedOutcome {
  if (outcome.spawnErrorCode !== undefined) {
    return failure(
      "environment",
      `${outcome.stage} stage could not start: ${outcome.spawnErrorCode}`
    );
  }
  if (outcome.cancelled) {
    return failure("cancelled");
  }
  if (outcome.timedOut) {
    return failure("timeout", describeOutput(outcome));
  }
  if (
    outcome.exitStatus !== null &&
    ENVIRONMENT_EXIT_STATUSES.has(outcome.exitStatus)
  ) {
    return failure("environment", describeOutput(outcome));
  }
  if (outcome.exitStatus === null) {
    const reason = `${outcome.stage} stage killed by ${outcome.signal ?? "unknown signal"}`;
    return failure(
      outcome.stage === "witness" ? "constraint_failure" : "prove_failure",
      reason
    );
  }
  return failure(
    outcome.stage === "witness" ? "constraint_failure" : "prove_failure",
    describeOutput(outcome)
  );
}

/**
 * Interpret the outcomes of one pipeline run, in execution order.
 * The first failing stage decides the result; success needs a proving stage.
 */
export function interpretOutcomes(
  outcomes: readonly StageOutcome[],
  artifact?: ProofArtifact
): InterpretedOutcome {
  for (const outcome of outcomes) {
    if (!isStageSuccess(outcome)) {
      return classifyFailure(outcome);
    }
  }

  if (!outcomes.some((outcome) => outcome.stage === "prove")) {
    return failure("internal", "pipeline ended before proof synthesis");
  }

  return {
    category: "success",
    result: {
      success: true,
      message: PROOF_MESSAGES.success,
      ...(artifact && { artifact }),
    },
  };
}

/**
 * Map an error thrown around the tools (working area, artifact I/O).
 */
export function interpretPipelineError(error: unknown): InterpretedOutcome {
  const detail = error instanceof Error ? error.message : String(error);
  if (error instanceof ProverError && error.kind === "environment") {
    return failure("environment", detail);
  }
  return failure("internal", detail);
}
