/**
 * Noir proof pipeline
 *
 * Runs witness generation (`nargo execute`) and proof synthesis
 * (`bb prove`) for one request inside its own working area.
 *
 * PRIVACY: the inputs are only written to the session's working area,
 * which is removed before the result is returned.
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { getErrorCode, ProverError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import {
  recordProofDuration,
  recordStageDuration,
} from "../observability/metrics.js";
import type {
  ProofArtifact,
  ProofRequest,
  ProofResult,
  StageName,
  StageOutcome,
} from "../verification/types.js";
import { toProverToml } from "./prover-toml.js";
import {
  type InterpretedOutcome,
  interpretOutcomes,
  interpretPipelineError,
  isStageSuccess,
} from "./result-parser.js";
import type { StageRunner } from "./stage-runner.js";
import { withWorkspace } from "./workspace.js";

export interface ProofPipelineOptions {
  runner: StageRunner;
  circuitDir: string;
  /** nargo package name; names the bytecode and witness files */
  circuitName: string;
  nargoBin: string;
  bbBin: string;
  workRoot: string;
  /** Deadline shared by both stages */
  timeoutMs: number;
  logger: Logger;
}

export interface ProofPipeline {
  prove(request: ProofRequest, signal?: AbortSignal): Promise<ProofResult>;
}

const TARGET_DIR = "target";
const PROOF_FILE = "proof";
/** Written ahead of time with `bb write_vk`; copied in with the circuit */
const VK_FILE = "vk";

/**
 * bb invocation for the compiled bytecode and the witness nargo wrote.
 */
export function proveStageArgs(circuitName: string): string[] {
  return [
    "prove",
    "-b",
    `./${TARGET_DIR}/${circuitName}.json`,
    "-w",
    `./${TARGET_DIR}/${circuitName}.gz`,
    "-o",
    `./${TARGET_DIR}`,
  ];
}

async function writeProverInputs(
  dir: string,
  request: ProofRequest
): Promise<void> {
  try {
    await writeFile(join(dir, "Prover.toml"), toProverToml(request.input), {
      mode: 0o600,
    });
  } catch (error) {
    throw new ProverError({
      operation: "write_inputs",
      message: "Cannot write Prover.toml",
      kind: "environment",
      code: getErrorCode(error),
      cause: error,
    });
  }
}

async function readProofArtifact(dir: string): Promise<ProofArtifact> {
  let bytes: Buffer;
  try {
    bytes = await readFile(join(dir, TARGET_DIR, PROOF_FILE));
  } catch (error) {
    throw new ProverError({
      operation: "read_artifact",
      message: "Prover exited cleanly but wrote no proof",
      kind: "internal",
      code: getErrorCode(error),
      cause: error,
    });
  }
  const verificationKey = await readVerificationKey(dir);
  return {
    proofBase64: bytes.toString("base64"),
    byteLength: bytes.length,
    ...(verificationKey && {
      verificationKeyBase64: verificationKey.toString("base64"),
    }),
  };
}

async function readVerificationKey(dir: string): Promise<Buffer | undefined> {
  try {
    return await readFile(join(dir, TARGET_DIR, VK_FILE));
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return undefined;
    }
    throw new ProverError({
      operation: "read_artifact",
      message: "Cannot read verification key",
      kind: "internal",
      code: getErrorCode(error),
      cause: error,
    });
  }
}

export function createProofPipeline(
  options: ProofPipelineOptions
): ProofPipeline {
  const { runner, circuitName, nargoBin, bbBin, timeoutMs } = options;

  async function runStage(
    stage: StageName,
    command: string,
    args: string[],
    cwd: string,
    deadline: number,
    log: Logger,
    signal?: AbortSignal
  ): Promise<StageOutcome> {
    log.debug({ stage, command }, "Stage started");
    const outcome = await runner.runStage({
      stage,
      command,
      args,
      cwd,
      signal,
      timeoutMs: Math.max(1, deadline - Date.now()),
    });
    const ok = isStageSuccess(outcome);
    recordStageDuration(stage, outcome.durationMs, {
      result: ok ? "ok" : "error",
    });
    log.debug(
      {
        stage,
        exitStatus: outcome.exitStatus,
        signal: outcome.signal,
        durationMs: outcome.durationMs,
      },
      ok ? "Stage succeeded" : "Stage failed"
    );
    return outcome;
  }

  async function prove(
    request: ProofRequest,
    signal?: AbortSignal
  ): Promise<ProofResult> {
    const log = options.logger.child({
      component: "proof-pipeline",
      sessionId: request.sessionId,
    });
    const startedAt = Date.now();
    const deadline = startedAt + timeoutMs;

    let interpreted: InterpretedOutcome;
    try {
      interpreted = await withWorkspace(
        {
          workRoot: options.workRoot,
          circuitDir: options.circuitDir,
          sessionId: request.sessionId,
          logger: log,
        },
        async ({ dir }) => {
          await writeProverInputs(dir, request);

          const witness = await runStage(
            "witness",
            nargoBin,
            ["execute"],
            dir,
            deadline,
            log,
            signal
          );
          if (!isStageSuccess(witness)) {
            return interpretOutcomes([witness]);
          }

          const proof = await runStage(
            "prove",
            bbBin,
            proveStageArgs(circuitName),
            dir,
            deadline,
            log,
            signal
          );
          if (!isStageSuccess(proof)) {
            return interpretOutcomes([witness, proof]);
          }

          const artifact = await readProofArtifact(dir);
          return interpretOutcomes([witness, proof], artifact);
        }
      );
    } catch (error) {
      interpreted = interpretPipelineError(error);
    }

    const durationMs = Date.now() - startedAt;
    recordProofDuration(durationMs, interpreted.category);

    const { category, result } = interpreted;
    const context = { category, durationMs, detail: result.rawDetail };
    if (category === "success") {
      log.info(
        { category, durationMs, proofBytes: result.artifact?.byteLength },
        "Proof generated"
      );
    } else if (category === "environment" || category === "internal") {
      // Deployment defect: operators need to see this
      log.error(context, "Proof pipeline unavailable");
    } else {
      log.warn(context, "Proof not generated");
    }

    return result;
  }

  return { prove };
}
