import { SessionStateError } from "../core/errors/engine.errors";
import type { SessionPhase, SessionSnapshot } from "./session.types";

const TRANSITIONS: Readonly<Record<SessionPhase, readonly SessionPhase[]>> = Object.freeze({
  NEW: ["RUNNING"],
  RUNNING: ["RUNNING", "SUSPENDED", "INTERRUPTED", "COMPLETED"],
  SUSPENDED: ["RUNNING"],
  INTERRUPTED: ["RUNNING"],
  COMPLETED: [],
});

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: SessionPhase, to: SessionPhase): void {
  if (!canTransition(from, to)) {
    throw new SessionStateError(`SESSION_TRANSITION_ERROR ${from} -> ${to}`);
  }
}

/**
 * Phase a stored snapshot is resumed from. A snapshot still marked RUNNING
 * was left behind by a process that died without suspending.
 */
export function phaseOnLoad(snapshot: SessionSnapshot): SessionPhase {
  if (snapshot.phase === "RUNNING") {
    return "INTERRUPTED";
  }
  return snapshot.phase;
}
