import { describe, expect, it } from "vitest";

import { ProverError } from "../../errors.js";
import type { StageName, StageOutcome } from "../../verification/types.js";
import {
  interpretOutcomes,
  interpretPipelineError,
  PROOF_MESSAGES,
} from "../result-parser.js";

function outcome(
  stage: StageName,
  overrides: Partial<StageOutcome> = {}
): StageOutcome {
  return {
    stage,
    exitStatus: 0,
    signal: null,
    stdout: "",
    stderr: "",
    durationMs: 10,
    timedOut: false,
    cancelled: false,
    ...overrides,
  };
}

describe("result parser", () => {
  it("reports success when both stages exit cleanly", () => {
    const artifact = { proofBase64: "cHJvb2Y=", byteLength: 5 };
    const interpreted = interpretOutcomes(
      [outcome("witness"), outcome("prove")],
      artifact
    );

    expect(interpreted).toEqual({
      category: "success",
      result: {
        success: true,
        message:
          "Proof generated successfully! The user is eligible for insurance discount.",
        artifact,
      },
    });
  });

  it("reports a witness failure as a constraint failure", () => {
    const interpreted = interpretOutcomes([
      outcome("witness", {
        exitStatus: 1,
        stderr: "error: Failed constraint\n",
      }),
    ]);

    expect(interpreted.category).toBe("constraint_failure");
    expect(interpreted.result).toEqual({
      success: false,
      message: PROOF_MESSAGES.constraint_failure,
      rawDetail: "error: Failed constraint",
    });
  });

  it("never claims success after a witness failure", () => {
    const interpreted = interpretOutcomes([
      outcome("witness", { exitStatus: 1 }),
      outcome("prove"),
    ]);

    expect(interpreted.result.success).toBe(false);
    expect(interpreted.category).toBe("constraint_failure");
  });

  it("falls back to stdout when stderr is empty", () => {
    const interpreted = interpretOutcomes([
      outcome("witness"),
      outcome("prove", { exitStatus: 2, stdout: "proving key mismatch" }),
    ]);

    expect(interpreted.category).toBe("prove_failure");
    expect(interpreted.result).toEqual({
      success: false,
      message: "Proof generation failed.",
      rawDetail: "proving key mismatch",
    });
  });

  it("omits rawDetail when the tool printed nothing", () => {
    const interpreted = interpretOutcomes([
      outcome("witness"),
      outcome("prove", { exitStatus: 1 }),
    ]);

    expect(interpreted.result).toEqual({
      success: false,
      message: "Proof generation failed.",
    });
  });

  it("treats a missing tool as an environment failure", () => {
    const interpreted = interpretOutcomes([
      outcome("witness", { exitStatus: null, spawnErrorCode: "ENOENT" }),
    ]);

    expect(interpreted.category).toBe("environment");
    expect(interpreted.result).toEqual({
      success: false,
      message: "Proof service is unavailable. Please try again later.",
      rawDetail: "witness stage could not start: ENOENT",
    });
  });

  it.each([126, 127])(
    "treats exit status %i as an environment failure",
    (exitStatus) => {
      const interpreted = interpretOutcomes([
        outcome("witness"),
        outcome("prove", { exitStatus, stderr: "bb: command not found" }),
      ]);
      expect(interpreted.category).toBe("environment");
    }
  );

  it("reports timeouts and cancellation", () => {
    expect(
      interpretOutcomes([
        outcome("witness", { exitStatus: null, signal: "SIGTERM", timedOut: true }),
      ]).result.message
    ).toBe("Proof generation timed out. Please try again later.");

    expect(
      interpretOutcomes([
        outcome("witness"),
        outcome("prove", { exitStatus: null, signal: "SIGTERM", cancelled: true }),
      ])
    ).toEqual({
      category: "cancelled",
      result: { success: false, message: "Proof generation was cancelled." },
    });
  });

  it("describes a stage killed by a signal", () => {
    const interpreted = interpretOutcomes([
      outcome("witness"),
      outcome("prove", { exitStatus: null, signal: "SIGKILL" }),
    ]);

    expect(interpreted.category).toBe("prove_failure");
    expect(interpreted.result.rawDetail).toBe("prove stage killed by SIGKILL");
  });

  it("requires a proving stage for success", () => {
    expect(interpretOutcomes([outcome("witness")]).category).toBe("internal");
  });

  it("maps environment prover errors", () => {
    const interpreted = interpretPipelineError(
      new ProverError({
        operation: "prepare_workspace",
        message: "Circuit project not found at /srv/circuit",
        kind: "environment",
      })
    );

    expect(interpreted).toEqual({
      category: "environment",
      result: {
        success: false,
        message: PROOF_MESSAGES.environment,
        rawDetail: "Circuit project not found at /srv/circuit",
      },
    });
  });

  it("maps unexpected errors to internal failures", () => {
    const interpreted = interpretPipelineError(new TypeError("boom"));
    expect(interpreted.category).toBe("internal");
    expect(interpreted.result.message).toBe(
      "Proof generation failed due to an internal error."
    );
  });
});
