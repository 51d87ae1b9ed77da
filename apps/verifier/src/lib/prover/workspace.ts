/**
 * Session-scoped working areas for the Noir toolchain.
 *
 * Every proof request runs inside its own copy of the circuit project so
 * concurrent sessions never share a Prover.toml, witness or proof file.
 */

import { access, cp, mkdtemp, rm } from "node:fs/promises";
import { basename, join } from "node:path";

import { getErrorCode, ProverError } from "../errors.js";
import type { Logger } from "../logging/index.js";

const WORKSPACE_PREFIX = "zk-insurance-";
/** Session ids end up in a path; UUIDs and test ids only */
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Per-run files that must not leak from the source project */
const EXCLUDED_ENTRIES = new Set(["Prover.toml", "proofs"]);

export interface Workspace {
  sessionId: string;
  dir: string;
}

export interface WorkspaceOptions {
  workRoot: string;
  circuitDir: string;
  sessionId: string;
  logger: Logger;
}

async function assertCircuitProject(circuitDir: string): Promise<void> {
  try {
    await access(join(circuitDir, "Nargo.toml"));
  } catch (error) {
    throw new ProverError({
      operation: "prepare_workspace",
      message: `Circuit project not found at ${circuitDir}`,
      kind: "environment",
      code: getErrorCode(error),
      cause: error,
    });
  }
}

async function allocateWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  const { workRoot, circuitDir, sessionId } = options;
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new ProverError({
      operation: "prepare_workspace",
      message: "Session id is not usable as a directory name",
      kind: "internal",
    });
  }

  await assertCircuitProject(circuitDir);

  let dir: string;
  try {
    dir = await mkdtemp(join(workRoot, `${WORKSPACE_PREFIX}${sessionId}-`));
  } catch (error) {
    throw new ProverError({
      operation: "prepare_workspace",
      message: `Cannot create working area under ${workRoot}`,
      kind: "environment",
      code: getErrorCode(error),
      cause: error,
    });
  }

  try {
    await cp(circuitDir, dir, {
      recursive: true,
      filter: (source) =>
        source === circuitDir || !EXCLUDED_ENTRIES.has(basename(source)),
    });
  } catch (error) {
    await rm(dir, { recursive: true, force: true });
    throw new ProverError({
      operation: "prepare_workspace",
      message: "Cannot copy circuit project into working area",
      kind: "environment",
      code: getErrorCode(error),
      cause: error,
    });
  }

  return { sessionId, dir };
}

/**
 * Run `fn` inside a fresh working area and remove it on every exit path.
 * A failed removal is logged; it never replaces the result of `fn`.
 */
export async function withWorkspace<T>(
  options: WorkspaceOptions,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = await allocateWorkspace(options);
  options.logger.debug({ dir: workspace.dir }, "Working area allocated");

  try {
    return await fn(workspace);
  } finally {
    try {
      await rm(workspace.dir, { recursive: true, force: true });
      options.logger.debug({ dir: workspace.dir }, "Working area released");
    } catch (error) {
      options.logger.error(
        { err: error, dir: workspace.dir },
        "Failed to release working area"
      );
    }
  }
}
