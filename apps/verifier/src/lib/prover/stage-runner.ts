/**
 * Stage runner - spawns one external proving tool and captures its outcome.
 *
 * The pipeline only depends on the StageRunner interface, so tests swap in
 * a fake and never need nargo or bb installed.
 */

import { spawn } from "node:child_process";

import { getErrorCode } from "../errors.js";
import type { StageName, StageOutcome } from "../verification/types.js";

export interface StageInvocation {
  stage: StageName;
  command: string;
  args: string[];
  /** Working directory of the tool, the session's working area */
  cwd: string;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface StageRunner {
  runStage(invocation: StageInvocation): Promise<StageOutcome>;
}

/** Per-stream capture limit; tools are chatty on failure */
const MAX_CAPTURE_BYTES = 1024 * 1024;

/** Time a killed tool gets to exit before SIGKILL */
const KILL_GRACE_MS = 2000;

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  push(chunk: Buffer): void {
    if (this.size >= MAX_CAPTURE_BYTES) return;
    const remaining = MAX_CAPTURE_BYTES - this.size;
    const kept = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

function runProcess(invocation: StageInvocation): Promise<StageOutcome> {
  const { stage, command, args, cwd, signal, timeoutMs } = invocation;
  const startedAt = Date.now();

  if (signal?.aborted) {
    return Promise.resolve(
      Object.freeze({
        stage,
        exitStatus: null,
        signal: null,
        stdout: "",
        stderr: "",
        durationMs: 0,
        timedOut: false,
        cancelled: true,
      })
    );
  }

  return new Promise((resolve) => {
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let settled = false;
    let timedOut = false;
    let cancelled = false;
    let spawnErrorCode: string | undefined;

    const child = spawn(command, args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const terminate = () => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      child.kill("SIGTERM");
      setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, KILL_GRACE_MS).unref();
    };

    const onAbort = () => {
      cancelled = true;
      terminate();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, timeoutMs)
        : undefined;

    const finish = (
      exitStatus: number | null,
      exitSignal: NodeJS.Signals | null
    ) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);

      resolve(
        Object.freeze({
          stage,
          exitStatus,
          signal: exitSignal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs: Date.now() - startedAt,
          ...(spawnErrorCode !== undefined && { spawnErrorCode }),
          timedOut,
          cancelled,
        })
      );
    };

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", (error) => {
      // Spawn failures (missing binary, not executable) never produce an exit
      spawnErrorCode = getErrorCode(error) ?? "UNKNOWN";
      finish(null, null);
    });

    child.once("close", (code, exitSignal) => {
      finish(code, exitSignal);
    });
  });
}

export function createProcessStageRunner(): StageRunner {
  return { runStage: runProcess };
}
