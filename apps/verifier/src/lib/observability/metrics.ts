import { type Attributes, metrics } from "@opentelemetry/api";

import type { OutcomeCategory, StageName } from "../verification/types.js";

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || "zk-insurance-verifier";
const SERVICE_VERSION = process.env.npm_package_version || "0.0.0";

const meter = metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);

const DURATION_BUCKETS_MS = [
  25, 50, 100, 250, 500, 1000, 2000, 5000, 10_000, 20_000, 40_000, 60_000,
  120_000,
];

const durationAdvice = { explicitBucketBoundaries: DURATION_BUCKETS_MS };

const stageDuration = meter.createHistogram("zk_insurance.stage.duration", {
  description: "External proving stage duration (nargo execute, bb prove).",
  unit: "ms",
  advice: durationAdvice,
});

const proofDuration = meter.createHistogram("zk_insurance.proof.duration", {
  description: "End-to-end proof pipeline duration per session.",
  unit: "ms",
  advice: durationAdvice,
});

const activeSessions = meter.createUpDownCounter(
  "zk_insurance.sessions.active",
  {
    description: "Client sessions currently being served.",
  }
);

const rejectedSessions = meter.createCounter("zk_insurance.sessions.rejected", {
  description: "Connections refused because the session cap was reached.",
});

export function recordStageDuration(
  stage: StageName,
  durationMs: number,
  attributes: Attributes & { result: "ok" | "error" }
): void {
  stageDuration.record(durationMs, { stage, ...attributes });
}

export function recordProofDuration(
  durationMs: number,
  category: OutcomeCategory
): void {
  proofDuration.record(durationMs, { category });
}

export function recordSessionOpened(): void {
  activeSessions.add(1);
}

export function recordSessionClosed(): void {
  activeSessions.add(-1);
}

export function recordSessionRejected(): void {
  rejectedSessions.add(1);
}
