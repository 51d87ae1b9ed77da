/**
 * Verification session state.
 *
 * Each TCP connection gets one session that runs a single verification.
 * All state is in-memory and dies with the connection.
 */

import { randomUUID } from "node:crypto";

// Session phases (simple state machine)
export type SessionPhase =
  | "greeting"
  | "awaiting_age"
  | "awaiting_bmi"
  | "proving" // External tools running
  | "responding"
  | "closed"; // Terminal

export interface SessionState {
  id: string;
  peer: string;
  phase: SessionPhase;
  age: number | null;
  bmiTimesTen: number | null;
  startedAt: number;
}

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  greeting: ["awaiting_age", "closed"],
  awaiting_age: ["awaiting_bmi", "closed"],
  awaiting_bmi: ["proving", "closed"],
  proving: ["responding", "closed"],
  responding: ["closed"],
  closed: [],
};

export function createSession(peer: string): SessionState {
  return {
    id: randomUUID(),
    peer,
    phase: "greeting",
    age: null,
    bmiTimesTen: null,
    startedAt: Date.now(),
  };
}

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move the session to its next phase.
 * Closing is always allowed and idempotent.
 */
export function advanceSession(session: SessionState, next: SessionPhase): void {
  if (next === "closed") {
    session.phase = "closed";
    return;
  }
  if (!canTransition(session.phase, next)) {
    throw new Error(`Invalid session transition ${session.phase} -> ${next}`);
  }
  session.phase = next;
}
