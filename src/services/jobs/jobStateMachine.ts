import { JobStatus } from "@/types/relay";
import { InvalidTransitionError } from "@/utils/errors";

// MIRRORING -> NEW and SENDING -> READY_TO_SEND release a claim without
// processing it (rate limit, stale sweep).
export const JOB_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  NEW: ["MIRRORING"],
  MIRRORING: ["PENDING_REPLY", "ERROR", "NEW"],
  PENDING_REPLY: ["READY_TO_SEND"],
  READY_TO_SEND: ["SENDING"],
  SENDING: ["COMPLETED", "ERROR", "READY_TO_SEND"],
  COMPLETED: [],
  ERROR: [],
};

export const ENTRY_STATUSES: readonly JobStatus[] = ["NEW", "READY_TO_SEND"];

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return JOB_TRANSITIONS[status].length === 0;
}

export function isClaimRelease(from: JobStatus, to: JobStatus): boolean {
  return (from === "MIRRORING" && to === "NEW") || (from === "SENDING" && to === "READY_TO_SEND");
}
