import type { VerifierConfig } from "../config.js";
import { type Logger, logger as rootLogger } from "../logging/index.js";
import {
  recordSessionClosed,
  recordSessionOpened,
} from "../observability/metrics.js";
import { createProofPipeline, type ProofPipeline } from "../prover/pipeline.js";
import {
  createProcessStageRunner,
  type StageRunner,
} from "../prover/stage-runner.js";

/**
 * Bounded set of live sessions. Each entry is the AbortController that
 * cancels the session's in-flight tools.
 */
export class SessionRegistry {
  private readonly controllers = new Set<AbortController>();

  constructor(readonly maxSessions: number) {}

  get active(): number {
    return this.controllers.size;
  }

  /**
   * Reserve a slot, or null when the cap is reached.
   */
  tryOpen(): AbortController | null {
    if (this.controllers.size >= this.maxSessions) {
      return null;
    }
    const controller = new AbortController();
    this.controllers.add(controller);
    recordSessionOpened();
    return controller;
  }

  release(controller: AbortController): void {
    if (this.controllers.delete(controller)) {
      recordSessionClosed();
    }
  }

  abortAll(reason: string): void {
    for (const controller of this.controllers) {
      controller.abort(new Error(reason));
    }
  }
}

/**
 * Process-wide state handed to every session handler.
 */
export interface ServiceContext {
  config: VerifierConfig;
  logger: Logger;
  pipeline: ProofPipeline;
  sessions: SessionRegistry;
}

export function createServiceContext(
  config: VerifierConfig,
  deps: { logger?: Logger; runner?: StageRunner; pipeline?: ProofPipeline } = {}
): ServiceContext {
  const logger = deps.logger ?? rootLogger;
  const pipeline =
    deps.pipeline ??
    createProofPipeline({
      runner: deps.runner ?? createProcessStageRunner(),
      circuitDir: config.circuitDir,
      circuitName: config.circuitName,
      nargoBin: config.nargoBin,
      bbBin: config.bbBin,
      workRoot: config.workRoot,
      timeoutMs: config.proveTimeoutMs,
      logger,
    });

  return {
    config,
    logger,
    pipeline,
    sessions: new SessionRegistry(config.maxSessions),
  };
}
