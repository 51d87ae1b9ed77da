#!/usr/bin/env node
/**
 * ZK Insurance Verifier - line-oriented TCP service
 *
 * Reads age and BMI from each client, proves eligibility with the Noir
 * toolchain (nargo + bb) and returns the proof.
 */

import { parseArgs, USAGE } from "./lib/cli-args.js";
import { loadConfig, type VerifierConfig } from "./lib/config.js";
import { ConfigError } from "./lib/errors.js";
import { logError, logger } from "./lib/logging/index.js";
import { createServiceContext } from "./lib/server/context.js";
import { startListener, type VerifierServer } from "./lib/server/listener.js";

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

/**
 * @returns The validated config, or the exit code when the process should
 *   stop before binding
 */
function resolveConfig(argv: string[]): VerifierConfig | number {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      process.stdout.write(USAGE);
      return 0;
    }
    return loadConfig(process.env, { port: args.port, host: args.host });
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = resolveConfig(process.argv.slice(2));
  if (typeof config === "number") {
    return config;
  }

  const context = createServiceContext(config);

  let server: VerifierServer;
  try {
    server = await startListener(context);
  } catch (error) {
    logError(error, { operation: "bind" }, logger);
    return 1;
  }

  const { host, port } = server.address();
  logger.info(
    {
      host,
      port,
      maxSessions: config.maxSessions,
      circuitDir: config.circuitDir,
      proofOutputDir: config.proofOutputDir,
    },
    "ZK Insurance Verifier listening"
  );
  logger.info(`Connect with: nc ${host === "0.0.0.0" ? "localhost" : host} ${port}`);

  const signal = await waitForShutdownSignal();
  logger.info({ signal }, "Shutting down");
  await server.close();
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError(error, { operation: "startup" }, logger);
    process.exitCode = 1;
  });
