/**
 * Session handler for the verifier line protocol.
 *
 * Each connection is one verification: read age, read BMI, prove, respond,
 * close. The handler only awaits its own I/O and its own proof, so a slow
 * proof never holds up other connections.
 */

import { createInterface } from "node:readline";
import type { Duplex } from "node:stream";

import { createSessionLogger, type Logger, logError } from "../logging/index.js";
import {
  createVerificationInput,
  describeValidationError,
  validateField,
} from "../verification/input-validator.js";
import { interpretPipelineError } from "../prover/result-parser.js";
import type { FieldKind } from "../verification/types.js";
import type { ServiceContext } from "./context.js";
import { saveProofDocument } from "./proof-store.js";
import {
  BANNER,
  formatProofResponse,
  formatRetryPrompt,
  IDLE_TIMEOUT_NOTICE,
  INPUT_TOO_LONG,
  PROMPTS,
  type ProofDocument,
  PROVING_NOTICE,
  toProofDocument,
} from "./protocol.js";
import { advanceSession, createSession, type SessionState } from "./session.js";

/** How long a finished connection waits for the client to hang up */
const LINGER_MS = 10_000;

/** Longest input line accepted; answers are a few digits */
export const MAX_LINE_BYTES = 1024;

const ABORTED = Symbol("aborted");
const IDLE = Symbol("idle");

/**
 * End our side of the connection and drop it if the client lingers.
 * Unread client bytes are drained so the response is not reset.
 */
export function endConnection(socket: Duplex, text?: string): void {
  if (socket.destroyed) return;
  socket.resume();
  if (text) {
    socket.end(text);
  } else {
    socket.end();
  }
  setTimeout(() => socket.destroy(), LINGER_MS).unref();
}

function onAbort(signal: AbortSignal): Promise<typeof ABORTED> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(ABORTED);
      return;
    }
    signal.addEventListener("abort", () => resolve(ABORTED), { once: true });
  });
}

async function saveProof(
  context: ServiceContext,
  session: SessionState,
  document: ProofDocument,
  log: Logger
): Promise<string | undefined> {
  const { proofOutputDir } = context.config;
  if (!proofOutputDir) return undefined;

  try {
    const fileName = await saveProofDocument(
      proofOutputDir,
      session.id,
      document
    );
    log.info({ fileName }, "Proof saved");
    return fileName;
  } catch (error) {
    logError(error, { sessionId: session.id, operation: "save_proof" }, log);
    return undefined;
  }
}

/**
 * Serve one client connection until it closes.
 *
 * @param controller - Registry slot of this session; aborting it cancels
 *   the session and its running tools
 */
export async function handleSession(
  socket: Duplex,
  context: ServiceContext,
  controller: AbortController,
  peer: string
): Promise<void> {
  const session = createSession(peer);
  const log = createSessionLogger(session.id, peer, context.logger);
  const { signal } = controller;
  const aborted = onAbort(signal);

  log.info("Connection opened");

  socket.on("error", (err) => {
    log.debug({ err }, "Connection error");
    controller.abort(err);
  });
  // Client gone: stop waiting and kill any running tool
  socket.once("close", () => controller.abort(new Error("connection closed")));

  // Bytes received since the last newline
  let pendingLineBytes = 0;
  const onData = (chunk: Buffer | string) => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    const lastNewline = bytes.lastIndexOf(0x0a);
    pendingLineBytes =
      lastNewline === -1
        ? pendingLineBytes + bytes.length
        : bytes.length - lastNewline - 1;
    if (pendingLineBytes > MAX_LINE_BYTES && !signal.aborted) {
      log.warn({ limit: MAX_LINE_BYTES }, "Input line too long");
      socket.write(INPUT_TOO_LONG);
      controller.abort(new Error("input line too long"));
    }
  };
  socket.on("data", onData);

  const lines = createInterface({ input: socket, crlfDelay: Number.POSITIVE_INFINITY });
  const iterator = lines[Symbol.asyncIterator]();

  async function readLine(): Promise<string | null> {
    if (signal.aborted) return null;

    let idleTimer: NodeJS.Timeout | undefined;
    const idle = new Promise<typeof IDLE>((resolve) => {
      idleTimer = setTimeout(
        () => resolve(IDLE),
        context.config.idleTimeoutMs
      );
    });
    try {
      const next = await Promise.race([iterator.next(), aborted, idle]);
      if (next === IDLE) {
        log.info({ idleTimeoutMs: context.config.idleTimeoutMs }, "Input timed out");
        await write(IDLE_TIMEOUT_NOTICE);
        return null;
      }
      if (next === ABORTED || next.done) return null;
      return next.value;
    } finally {
      clearTimeout(idleTimer);
    }
  }

  function write(text: string): Promise<boolean> {
    if (signal.aborted || socket.destroyed || !socket.writable) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      socket.write(text, (err) => resolve(!err));
    });
  }

  /**
   * Re-prompts until a valid value arrives.
   * null means the client hung up, sent a blank line or went idle.
   */
  async function readField(kind: FieldKind): Promise<number | null> {
    for (;;) {
      const line = await readLine();
      if (line === null || line.trim() === "") {
        return null;
      }

      const validation = validateField(line, kind);
      if (validation.ok) {
        return validation.value;
      }

      log.debug({ field: kind, reason: validation.error.kind }, "Input rejected");
      const retry = formatRetryPrompt(
        describeValidationError(validation.error, kind),
        kind
      );
      if (!(await write(retry))) {
        return null;
      }
    }
  }

  // Single-shot protocol: once both answers are in, end of input means
  // the client has gone away
  const onClientEnd = () => controller.abort(new Error("client ended input"));

  try {
    if (!(await write(BANNER + PROMPTS.age))) return;
    advanceSession(session, "awaiting_age");

    const age = await readField("age");
    if (age === null) return;
    session.age = age;

    if (!(await write(PROMPTS.bmi))) return;
    advanceSession(session, "awaiting_bmi");

    const bmiTimesTen = await readField("bmi");
    if (bmiTimesTen === null) return;
    session.bmiTimesTen = bmiTimesTen;

    advanceSession(session, "proving");
    if (socket.readableEnded) {
      onClientEnd();
    } else {
      socket.once("end", onClientEnd);
    }
    if (!(await write(PROVING_NOTICE))) return;

    const result = await context.pipeline.prove(
      {
        sessionId: session.id,
        input: createVerificationInput(age, bmiTimesTen),
      },
      signal
    );
    if (signal.aborted) {
      log.info("Client left before the proof was ready");
      return;
    }

    advanceSession(session, "responding");
    const savedFile = result.success
      ? await saveProof(context, session, toProofDocument(result), log)
      : undefined;
    await write(formatProofResponse(result, savedFile));
  } catch (error) {
    logError(error, { sessionId: session.id, peer, phase: session.phase }, log);
    if (session.phase === "proving") {
      advanceSession(session, "responding");
      await write(formatProofResponse(interpretPipelineError(error).result));
    }
  } finally {
    const lastPhase = session.phase;
    advanceSession(session, "closed");
    socket.off("end", onClientEnd);
    socket.off("data", onData);
    lines.close();
    endConnection(socket);
    log.info(
      { lastPhase, durationMs: Date.now() - session.startedAt },
      "Connection closed"
    );
  }
}
