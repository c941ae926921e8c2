/**
 * Run ids tie together the log lines of one CLI invocation. They read as
 * `YYYYMMDD-xxxxxx`: the UTC date, then three random bytes in hex.
 */

import { randomBytes } from "node:crypto";

export function generateRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/** Start a new run; later log lines carry the returned id. */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/** The id of the current run, or null before initRunId(). */
export function getRunId(): string | null {
  return currentRunId;
}
