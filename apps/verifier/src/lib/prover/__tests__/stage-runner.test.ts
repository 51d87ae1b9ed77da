import { tmpdir } from "node:os";

import { describe, expect, it } from "vitest";

import { createProcessStageRunner } from "../stage-runner.js";

/**
 * The Node binary itself stands in for nargo and bb.
 */
const NODE = process.execPath;

describe("process stage runner", () => {
  const runner = createProcessStageRunner();

  it("captures exit status and both output streams", async () => {
    const outcome = await runner.runStage({
      stage: "witness",
      command: NODE,
      args: [
        "-e",
        "process.stdout.write('witness saved'); process.stderr.write('warning: unused'); process.exit(0)",
      ],
      cwd: tmpdir(),
    });

    expect(outcome).toMatchObject({
      stage: "witness",
      exitStatus: 0,
      signal: null,
      stdout: "witness saved",
      stderr: "warning: unused",
      timedOut: false,
      cancelled: false,
    });
    expect(outcome.spawnErrorCode).toBeUndefined();
    expect(Object.isFrozen(outcome)).toBe(true);
  });

  it("reports non-zero exits", async () => {
    const outcome = await runner.runStage({
      stage: "prove",
      command: NODE,
      args: ["-e", "process.stderr.write('bad witness'); process.exit(3)"],
      cwd: tmpdir(),
    });

    expect(outcome.exitStatus).toBe(3);
    expect(outcome.stderr).toBe("bad witness");
  });

  it("reports a missing executable as a spawn error", async () => {
    const outcome = await runner.runStage({
      stage: "witness",
      command: "zk-insurance-missing-tool",
      args: ["execute"],
      cwd: tmpdir(),
    });

    expect(outcome.exitStatus).toBeNull();
    expect(outcome.spawnErrorCode).toBe("ENOENT");
  });

  it("kills a stage that passes its timeout", async () => {
    const outcome = await runner.runStage({
      stage: "prove",
      command: NODE,
      args: ["-e", "setTimeout(() => {}, 30000)"],
      cwd: tmpdir(),
      timeoutMs: 100,
    });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitStatus).toBeNull();
    expect(outcome.signal).toBe("SIGTERM");
  });

  it("kills a stage when its session is aborted", async () => {
    const controller = new AbortController();
    const pending = runner.runStage({
      stage: "witness",
      command: NODE,
      args: ["-e", "setTimeout(() => {}, 30000)"],
      cwd: tmpdir(),
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);

    const outcome = await pending;
    expect(outcome.cancelled).toBe(true);
    expect(outcome.signal).toBe("SIGTERM");
  });

  it("does not start a stage for an already aborted session", async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await runner.runStage({
      stage: "witness",
      command: "zk-insurance-missing-tool",
      args: [],
      cwd: tmpdir(),
      signal: controller.signal,
    });

    expect(outcome).toEqual({
      stage: "witness",
      exitStatus: null,
      signal: null,
      stdout: "",
      stderr: "",
      durationMs: 0,
      timedOut: false,
      cancelled: true,
    });
  });
});
