import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";

/** Circuit location inside the container image */
const CONTAINER_CIRCUIT_DIR = "/app/noir-circuit";
/** Circuit location when running from a source checkout */
const LOCAL_CIRCUIT_DIR = "../noir-circuit";

const DEFAULT_PORT = 8080;
const DEFAULT_MAX_SESSIONS = 16;
const DEFAULT_PROVE_TIMEOUT_MS = 120_000;
const DEFAULT_IDLE_TIMEOUT_MS = 300_000;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_PORT),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  MAX_SESSIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_SESSIONS),
  CIRCUIT_DIR: optionalString,
  CIRCUIT_NAME: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]+$/, "must be a nargo package name")
    .default("insurance_verifier"),
  NARGO_BIN: z.string().trim().min(1).default("nargo"),
  BB_BIN: z.string().trim().min(1).default("bb"),
  PROVE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_PROVE_TIMEOUT_MS),
  IDLE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_IDLE_TIMEOUT_MS),
  WORK_ROOT: optionalString,
  PROOF_OUTPUT_DIR: optionalString,
});

export interface VerifierConfig {
  port: number;
  host: string;
  maxSessions: number;
  circuitDir: string;
  circuitName: string;
  nargoBin: string;
  bbBin: string;
  proveTimeoutMs: number;
  /** How long a session may wait for one input line */
  idleTimeoutMs: number;
  workRoot: string;
  proofOutputDir?: string;
}

export type ConfigOverrides = Partial<Pick<VerifierConfig, "port" | "host">>;

/**
 * Container layout first, then a sibling checkout of the circuit.
 */
export function resolveCircuitDir(
  configured: string | undefined,
  exists: (path: string) => boolean = existsSync
): string {
  if (configured) {
    return resolve(configured);
  }
  if (exists(CONTAINER_CIRCUIT_DIR)) {
    return CONTAINER_CIRCUIT_DIR;
  }
  return resolve(LOCAL_CIRCUIT_DIR);
}

/**
 * Load and validate configuration from the environment.
 * CLI overrides win over environment values.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): VerifierConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
      )
    );
  }

  const values = parsed.data;
  return {
    port: overrides.port ?? values.PORT,
    host: overrides.host ?? values.HOST,
    maxSessions: values.MAX_SESSIONS,
    circuitDir: resolveCircuitDir(values.CIRCUIT_DIR),
    circuitName: values.CIRCUIT_NAME,
    nargoBin: values.NARGO_BIN,
    bbBin: values.BB_BIN,
    proveTimeoutMs: values.PROVE_TIMEOUT_MS,
    idleTimeoutMs: values.IDLE_TIMEOUT_MS,
    workRoot: values.WORK_ROOT ? resolve(values.WORK_ROOT) : tmpdir(),
    proofOutputDir: values.PROOF_OUTPUT_DIR
      ? resolve(values.PROOF_OUTPUT_DIR)
      : undefined,
  };
}
